/**
 * Zod schemas for the wire format and the config file
 * Server payloads are snake_case; domain types are camelCase.
 */

import { z } from "zod";
import type { Config, Page, Snippet, SnippetSummary } from "./types.js";

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

const VisibilitySchema = z.enum(["public", "private"]);

const FileMetaSchema = z.object({
  filename: z.string(),
  language: z.string().nullish(),
});

const FileSchema = FileMetaSchema.extend({
  content: z.string(),
});

const snippetFields = {
  id: z.number().int().positive(),
  title: z.string(),
  description: z.string().nullish(),
  visibility: VisibilitySchema,
  categories: z.array(z.string()).nullish(),
  created_at: z.string(),
  updated_at: z.string(),
};

function language(value: string | null | undefined): { language?: string } {
  return value ? { language: value } : {};
}

/**
 * Full snippet, as returned by get/create/update/search
 */
export const SnippetSchema = z
  .object({ ...snippetFields, files: z.array(FileSchema) })
  .transform(
    (raw): Snippet => ({
      id: raw.id,
      title: raw.title,
      description: raw.description ?? "",
      visibility: raw.visibility,
      categories: raw.categories ?? [],
      files: raw.files.map((file) => ({
        filename: file.filename,
        content: file.content,
        ...language(file.language),
      })),
      createdAt: raw.created_at,
      updatedAt: raw.updated_at,
    })
  );

/**
 * Snippet in a listing; file contents are not included
 */
export const SnippetSummarySchema = z
  .object({ ...snippetFields, files: z.array(FileMetaSchema).nullish() })
  .transform(
    (raw): SnippetSummary => ({
      id: raw.id,
      title: raw.title,
      description: raw.description ?? "",
      visibility: raw.visibility,
      categories: raw.categories ?? [],
      files: (raw.files ?? []).map((file) => ({
        filename: file.filename,
        ...language(file.language),
      })),
      createdAt: raw.created_at,
      updatedAt: raw.updated_at,
    })
  );

export const PageSchema = z
  .object({
    items: z.array(SnippetSummarySchema),
    page: z.number().int().positive(),
    page_size: z.number().int().positive(),
    total: z.number().int().nonnegative(),
  })
  .transform(
    (raw): Page => ({
      items: raw.items,
      page: raw.page,
      pageSize: raw.page_size,
      total: raw.total,
    })
  );

export const SnippetListSchema = z.array(SnippetSchema);

export const LoginResponseSchema = z.object({ token: z.string().min(1) });

export const ApiKeyResponseSchema = z.object({ key: z.string().min(1) });

/**
 * The config file. Unknown keys are dropped.
 */
export const ConfigFileSchema = z
  .object({
    server_url: z.string().url().optional(),
    default_page_size: z.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
  })
  .transform(
    (raw): Config => ({
      ...(raw.server_url !== undefined ? { serverUrl: raw.server_url } : {}),
      defaultPageSize: raw.default_page_size,
    })
  );

/**
 * Serialize a Config to its on-disk shape
 */
export function toConfigFile(config: Config): Record<string, unknown> {
  return {
    ...(config.serverUrl !== undefined ? { server_url: config.serverUrl } : {}),
    default_page_size: config.defaultPageSize,
  };
}
