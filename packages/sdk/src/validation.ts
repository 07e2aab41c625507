/**
 * Input validation for SnipStash operations
 *
 * Every value is checked and normalized here before a request is built, so a
 * rejected input never costs a round trip.
 */

import { z } from "zod";
import { ValidationError, type ValidationIssue } from "./errors.js";
import { MAX_PAGE_SIZE } from "./schemas.js";
import type { SearchQuery, SnippetInput, SortOrder } from "./types.js";

export const SORT_ORDERS = ["newest", "oldest", "alpha-asc", "alpha-desc"] as const satisfies readonly SortOrder[];

const FilenameSchema = z
  .string()
  .min(1, "filename must not be empty")
  .refine((name) => !/[\\/]/.test(name), "filename must not contain path separators")
  .refine((name) => name !== "." && name !== "..", "filename must not be . or ..");

const FileInputSchema = z.object({
  filename: FilenameSchema,
  content: z.union([z.string(), z.instanceof(Uint8Array)]),
  contentType: z.string().min(1).optional(),
});

const SnippetInputSchema = z.object({
  title: z.string().trim().min(1, "title is required"),
  description: z.string().trim(),
  visibility: z.enum(["public", "private"]),
  categories: z.array(z.string()).transform(normalizeCategories),
  files: z.array(FileInputSchema).min(1, "at least one file is required"),
});

const SearchQuerySchema = z.object({
  text: z.string().trim().min(1, "search text is required"),
  sort: z.enum(SORT_ORDERS).default("newest"),
  searchCode: z.boolean().default(false),
});

const IdSchema = z.number().int("id must be an integer").positive("id must be positive");

const PageNumberSchema = z.number().int("page must be an integer").positive("page must be positive");

const PageSizeSchema = z
  .number()
  .int("page size must be an integer")
  .positive("page size must be positive")
  .max(MAX_PAGE_SIZE, `page size must be <= ${MAX_PAGE_SIZE}`);

/**
 * Trim categories, drop empty ones and duplicates, keep first-seen order
 */
export function normalizeCategories(categories: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const category of categories) {
    const trimmed = category.trim();
    if (trimmed) {
      seen.add(trimmed);
    }
  }
  return [...seen];
}

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(toIssues(result.error));
  }
  return result.data;
}

/**
 * Validate and normalize snippet fields for create or update
 * @throws {ValidationError}
 */
export function validateSnippetInput(input: SnippetInput): SnippetInput {
  return parseWith(SnippetInputSchema, input);
}

/**
 * Validate a search query, filling in the default sort
 * @throws {ValidationError}
 */
export function validateSearchQuery(query: SearchQuery): Required<SearchQuery> {
  return parseWith(SearchQuerySchema, query);
}

/**
 * @throws {ValidationError} Unless `id` is a positive integer
 */
export function validateId(id: number): number {
  return parseWith(IdSchema, id);
}

/**
 * @throws {ValidationError} Unless `page` is a positive integer
 */
export function validatePageNumber(page: number): number {
  return parseWith(PageNumberSchema, page);
}

/**
 * @throws {ValidationError} Unless `size` is an integer in 1..MAX_PAGE_SIZE
 */
export function validatePageSize(size: number): number {
  return parseWith(PageSizeSchema, size);
}

/**
 * Check that a server URL is an absolute http(s) URL
 * @throws {ValidationError}
 */
export function validateServerUrl(serverUrl: string): string {
  let parsed: URL;
  try {
    parsed = new URL(serverUrl.trim());
  } catch {
    throw new ValidationError([
      {
        path: "serverUrl",
        message: `invalid URL "${serverUrl}", make sure it starts with http:// or https://`,
      },
    ]);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ValidationError([
      { path: "serverUrl", message: `unsupported protocol "${parsed.protocol}", use http:// or https://` },
    ]);
  }
  return serverUrl.trim();
}

/**
 * Parse a sort order name
 * @throws {ValidationError}
 */
export function parseSortOrder(value: string): SortOrder {
  const found = SORT_ORDERS.find((order) => order === value);
  if (!found) {
    throw new ValidationError([
      { path: "sort", message: `unknown sort order "${value}" (expected ${SORT_ORDERS.join(", ")})` },
    ]);
  }
  return found;
}
