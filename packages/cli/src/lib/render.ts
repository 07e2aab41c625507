/**
 * Output rendering helpers
 */

import type { Page, SessionStatus, SnippetSummary } from "@snipstash/sdk";
import type { Output } from "./io.js";

type Color = "red" | "green" | "yellow";

/**
 * Print JSON to stdout
 */
export function printJson(output: Output, data: unknown): void {
  output.out(JSON.stringify(data, null, 2) + "\n");
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(output: Output, lines: readonly string[]): void {
  for (const line of lines) {
    output.out(line + "\n");
  }
}

/**
 * One snippet per line: id, visibility, title, categories (tab-separated)
 */
export function formatSnippetLine(snippet: SnippetSummary): string {
  return [String(snippet.id), snippet.visibility, snippet.title, snippet.categories.join(",")].join("\t");
}

/**
 * Footer for a single listing page
 */
export function formatPageFooter(page: Page): string {
  const pages = Math.max(1, Math.ceil(page.total / page.pageSize));
  return `Page ${page.page} of ${pages} (${page.total} snippet${page.total === 1 ? "" : "s"})`;
}

export function formatStatus(status: SessionStatus): string {
  if (status.state === "authenticated") {
    return `Logged in to ${status.serverUrl}`;
  }
  return status.serverUrl !== undefined ? `Not logged in (server: ${status.serverUrl})` : "Not logged in";
}

/**
 * Apply ANSI color only if the stream is a TTY
 */
export function colorize(text: string, color: Color, isTTY: boolean): string {
  if (!isTTY) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
