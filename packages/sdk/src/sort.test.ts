import { describe, it, expect } from "vitest";
import { sortSnippets } from "./sort.js";

const items = [
  { id: 1, title: "beta", updatedAt: "2026-01-03T00:00:00.000Z" },
  { id: 2, title: "Alpha", updatedAt: "2026-01-01T00:00:00.000Z" },
  { id: 3, title: "gamma", updatedAt: "2026-01-03T00:00:00.000Z" },
  { id: 4, title: "alpha", updatedAt: "2026-01-02T00:00:00.000Z" },
  { id: 5, title: "_misc", updatedAt: "not a date" },
];

const ids = (list: Array<{ id: number }>): number[] => list.map((item) => item.id);

describe("sortSnippets", () => {
  it("should order newest first with ties by id", () => {
    expect(ids(sortSnippets(items, "newest"))).toEqual([1, 3, 4, 2, 5]);
  });

  it("should order oldest first with unparseable dates before everything", () => {
    expect(ids(sortSnippets(items, "oldest"))).toEqual([5, 2, 4, 1, 3]);
  });

  it("should order titles case-insensitively by code point", () => {
    expect(ids(sortSnippets(items, "alpha-asc"))).toEqual([5, 2, 4, 1, 3]);
  });

  it("should make alpha-desc the exact reverse of alpha-asc", () => {
    const asc = ids(sortSnippets(items, "alpha-asc"));

    expect(ids(sortSnippets(items, "alpha-desc"))).toEqual([...asc].reverse());
  });

  it("should not mutate its input", () => {
    const before = ids(items);
    sortSnippets(items, "alpha-desc");

    expect(ids(items)).toEqual(before);
  });
});
