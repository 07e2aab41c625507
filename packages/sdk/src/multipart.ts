/**
 * Multipart bodies for snippet create and update
 *
 * Part order: title, description, visibility, one `categories[]` part per
 * category, then one `files[]` part per file in the order supplied.
 */

import * as path from "node:path";
import type { FileInput, SnippetInput } from "./types.js";

const CONTENT_TYPES: Record<string, string> = {
  ".json": "application/json",
  ".js": "text/javascript",
  ".mjs": "text/javascript",
  ".ts": "text/x-typescript",
  ".html": "text/html",
  ".css": "text/css",
  ".md": "text/markdown",
  ".xml": "application/xml",
  ".yaml": "application/yaml",
  ".yml": "application/yaml",
  ".sh": "application/x-sh",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".gif": "image/gif",
  ".pdf": "application/pdf",
};

/**
 * Content type for an upload part; text/plain unless the extension says otherwise
 */
export function guessContentType(filename: string): string {
  return CONTENT_TYPES[path.extname(filename).toLowerCase()] ?? "text/plain";
}

function filePart(file: FileInput): Blob {
  // Copy into a fresh ArrayBuffer-backed view so Blob accepts any Uint8Array source
  const content = typeof file.content === "string" ? file.content : new Uint8Array(file.content);
  return new Blob([content], { type: file.contentType ?? guessContentType(file.filename) });
}

/**
 * Encode snippet fields and files as multipart/form-data
 */
export function encodeSnippetForm(input: SnippetInput): FormData {
  const form = new FormData();
  form.append("title", input.title);
  form.append("description", input.description);
  form.append("visibility", input.visibility);
  for (const category of input.categories) {
    form.append("categories[]", category);
  }
  for (const file of input.files) {
    form.append("files[]", filePart(file), file.filename);
  }
  return form;
}
