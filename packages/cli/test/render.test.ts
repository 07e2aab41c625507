import { describe, it, expect } from "vitest";
import { colorize, formatPageFooter, formatSnippetLine, formatStatus } from "../src/lib/render.js";

describe("render", () => {
  it("should format one tab-separated line per snippet", () => {
    expect(
      formatSnippetLine({
        id: 7,
        title: "Retry helper",
        description: "",
        visibility: "public",
        categories: ["ts", "async"],
        files: [{ filename: "retry.ts" }],
        createdAt: "2026-01-01T00:00:00.000Z",
        updatedAt: "2026-01-01T00:00:00.000Z",
      })
    ).toBe("7\tpublic\tRetry helper\tts,async");
  });

  it("should count pages in the footer", () => {
    expect(formatPageFooter({ items: [], page: 2, pageSize: 10, total: 21 })).toBe("Page 2 of 3 (21 snippets)");
    expect(formatPageFooter({ items: [], page: 1, pageSize: 10, total: 1 })).toBe("Page 1 of 1 (1 snippet)");
    expect(formatPageFooter({ items: [], page: 1, pageSize: 10, total: 0 })).toBe("Page 1 of 1 (0 snippets)");
  });

  it("should describe the session", () => {
    expect(formatStatus({ state: "authenticated", serverUrl: "https://x.tld" })).toBe("Logged in to https://x.tld");
    expect(formatStatus({ state: "unauthenticated", serverUrl: "https://x.tld" })).toBe(
      "Not logged in (server: https://x.tld)"
    );
    expect(formatStatus({ state: "unauthenticated" })).toBe("Not logged in");
  });

  it("should color only for terminals", () => {
    expect(colorize("boom", "red", false)).toBe("boom");
    expect(colorize("boom", "red", true)).toBe("\x1b[31mboom\x1b[0m");
  });
});
