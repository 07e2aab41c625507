/**
 * Deterministic ordering of search results
 *
 * - newest / oldest: by updatedAt descending / ascending
 * - alpha-asc: by title, case-insensitive, compared by code point
 * - alpha-desc: exact reverse of alpha-asc
 * Ties are broken by id ascending (alpha-desc inherits the reversed tie order).
 */

import type { SortOrder } from "./types.js";

interface Sortable {
  id: number;
  title: string;
  updatedAt: string;
}

function timestamp(value: string): number {
  const ms = Date.parse(value);
  // Unparseable dates sort as the oldest
  return Number.isNaN(ms) ? Number.NEGATIVE_INFINITY : ms;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareTime(a: Sortable, b: Sortable): number {
  const ta = timestamp(a.updatedAt);
  const tb = timestamp(b.updatedAt);
  if (ta === tb) return 0;
  return ta < tb ? -1 : 1;
}

function byId(a: Sortable, b: Sortable): number {
  return a.id - b.id;
}

function byTitle(a: Sortable, b: Sortable): number {
  return compareText(a.title.toLowerCase(), b.title.toLowerCase()) || byId(a, b);
}

/**
 * Return a sorted copy of `items`
 */
export function sortSnippets<T extends Sortable>(items: readonly T[], order: SortOrder): T[] {
  const copy = [...items];
  switch (order) {
    case "newest":
      return copy.sort((a, b) => compareTime(b, a) || byId(a, b));
    case "oldest":
      return copy.sort((a, b) => compareTime(a, b) || byId(a, b));
    case "alpha-asc":
      return copy.sort(byTitle);
    case "alpha-desc":
      return copy.sort(byTitle).reverse();
  }
}
