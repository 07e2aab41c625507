import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Logger, type LogLevel } from "./logs.js";

describe("Logger", () => {
  let lines: Array<[string, LogLevel]>;
  let log: Logger;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));
    lines = [];
    log = new Logger((line, level) => lines.push([line, level]));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllEnvs();
  });

  it("should format level, event, request and details", () => {
    log.warn("http.response", { method: "GET", url: "https://x.tld/snippets", details: { status: 429 } });

    expect(lines).toEqual([
      ['[2026-01-01T00:00:00.000Z] [WARN] [http.response] GET https://x.tld/snippets {"status":429}', "warn"],
    ]);
  });

  it("should include a message", () => {
    log.error("config.load", { message: "bad json" });

    expect(lines[0]?.[0]).toBe("[2026-01-01T00:00:00.000Z] [ERROR] [config.load] bad json");
  });

  it("should drop debug lines unless SNIPSTASH_DEBUG is set", () => {
    vi.stubEnv("SNIPSTASH_DEBUG", "");
    log.debug("quiet");
    vi.stubEnv("SNIPSTASH_DEBUG", "1");
    log.debug("loud");

    expect(lines.map(([line]) => line)).toEqual(["[2026-01-01T00:00:00.000Z] [DEBUG] [loud]"]);
  });

  it("should be silent when disabled", () => {
    log.setEnabled(false);
    log.info("ignored");
    log.setEnabled(true);
    log.info("kept");

    expect(lines).toHaveLength(1);
  });
});
