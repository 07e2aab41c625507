/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { MAX_PAGE_SIZE, SORT_ORDERS, type SortOrder } from "@snipstash/sdk";

/**
 * Parse a positive integer argument
 */
export function parsePositiveInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a positive integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (parsed === 0 || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`${name} must be a positive integer`);
  }

  return parsed;
}

/**
 * Parse a page size (1..MAX_PAGE_SIZE)
 */
export function parsePageSize(value: string, name: string): number {
  const parsed = parsePositiveInt(value, name);
  if (parsed > MAX_PAGE_SIZE) {
    throw new InvalidArgumentError(`${name} must be <= ${MAX_PAGE_SIZE}`);
  }
  return parsed;
}

/**
 * Parse a search sort order
 */
export function parseSort(value: string): SortOrder {
  const found = SORT_ORDERS.find((order) => order === value.trim());
  if (!found) {
    throw new InvalidArgumentError(`must be one of ${SORT_ORDERS.join(", ")}`);
  }
  return found;
}

/**
 * Split a comma-separated category list
 */
export function parseCategories(value: string): string[] {
  return value
    .split(",")
    .map((category) => category.trim())
    .filter(Boolean);
}
