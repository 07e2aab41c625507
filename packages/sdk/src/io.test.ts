import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readdir, readFile, stat, writeFile, chmod } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { atomicWrite, errorCode, readTextIfExists } from "./io.js";

describe("io operations", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "snipstash-io-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("atomicWrite", () => {
    it("should write content and create parent directories", async () => {
      const filePath = join(testDir, "a", "b", "config.json");

      await atomicWrite(filePath, '{"server_url":"https://x.tld"}');

      expect(await readFile(filePath, "utf8")).toBe('{"server_url":"https://x.tld"}');
    });

    it("should replace existing content", async () => {
      const filePath = join(testDir, "config.json");

      await atomicWrite(filePath, "first");
      await atomicWrite(filePath, "second");

      expect(await readFile(filePath, "utf8")).toBe("second");
    });

    it("should leave no temp files behind", async () => {
      await atomicWrite(join(testDir, "config.json"), "{}");

      expect(await readdir(testDir)).toEqual(["config.json"]);
    });

    it("should end with one complete value after concurrent writes", async () => {
      const filePath = join(testDir, "config.json");
      const values = Array.from({ length: 10 }, (_, i) => `write-${i}`);

      await Promise.all(values.map((value) => atomicWrite(filePath, value)));

      expect(values).toContain(await readFile(filePath, "utf8"));
      expect(await readdir(testDir)).toEqual(["config.json"]);
    });

    it.skipIf(process.platform === "win32")("should tighten the mode of an existing file", async () => {
      const filePath = join(testDir, "credentials.json");
      await writeFile(filePath, "{}");
      await chmod(filePath, 0o644);

      await atomicWrite(filePath, "{}");

      expect((await stat(filePath)).mode & 0o777).toBe(0o600);
    });

    it("should reject and clean up when the target is a directory", async () => {
      const filePath = join(testDir, "taken");
      await atomicWrite(join(filePath, "inner"), "x");

      await expect(atomicWrite(filePath, "y")).rejects.toThrow();
      expect(await readdir(testDir)).toEqual(["taken"]);
    });
  });

  describe("readTextIfExists", () => {
    it("should return file contents", async () => {
      const filePath = join(testDir, "present.json");
      await writeFile(filePath, "hello");

      expect(await readTextIfExists(filePath)).toBe("hello");
    });

    it("should return null for a missing file", async () => {
      expect(await readTextIfExists(join(testDir, "missing.json"))).toBeNull();
    });

    it("should rethrow other errors", async () => {
      await expect(readTextIfExists(testDir)).rejects.toThrow();
    });
  });

  describe("errorCode", () => {
    it("should read the code of system errors", () => {
      expect(errorCode(Object.assign(new Error("boom"), { code: "ENOENT" }))).toBe("ENOENT");
    });

    it("should return undefined for anything else", () => {
      expect(errorCode(new Error("boom"))).toBeUndefined();
      expect(errorCode("ENOENT")).toBeUndefined();
      expect(errorCode({ code: 2 })).toBeUndefined();
    });
  });
});
