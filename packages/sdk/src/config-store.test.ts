import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { createTempDir, removeDir } from "@snipstash/testkit";
import { FileConfigStore, defaultConfig } from "./config-store.js";
import { ConfigError } from "./errors.js";
import { resolveConfigDir, normalizeServerUrl } from "./paths.js";

describe("FileConfigStore", () => {
  let dir: string;
  let store: FileConfigStore;

  beforeEach(async () => {
    dir = await createTempDir();
    store = new FileConfigStore({ dir });
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("should place config.json in the given directory", () => {
    expect(store.path).toBe(path.join(dir, "config.json"));
  });

  it("should load defaults when no file exists", async () => {
    expect(await store.load()).toEqual({ defaultPageSize: 10 });
    expect(defaultConfig()).toEqual({ defaultPageSize: 10 });
  });

  it("should round-trip a saved config", async () => {
    await store.save({ serverUrl: "https://x.tld", defaultPageSize: 25 });

    expect(await store.load()).toEqual({ serverUrl: "https://x.tld", defaultPageSize: 25 });
  });

  it("should write only server_url and default_page_size", async () => {
    await store.save({ serverUrl: "https://x.tld", defaultPageSize: 25 });

    const raw: unknown = JSON.parse(await readFile(store.path, "utf8"));
    expect(raw).toEqual({ server_url: "https://x.tld", default_page_size: 25 });
  });

  it.skipIf(process.platform === "win32")("should write the file owner-only", async () => {
    await store.save({ defaultPageSize: 10 });

    const { mode } = await stat(store.path);
    expect(mode & 0o777).toBe(0o600);
  });

  it("should fill in a missing page size and drop unknown keys", async () => {
    await writeFile(store.path, JSON.stringify({ server_url: "https://x.tld", theme: "dark" }));

    expect(await store.load()).toEqual({ serverUrl: "https://x.tld", defaultPageSize: 10 });
  });

  it("should accept a file with a byte order mark", async () => {
    await writeFile(store.path, "\uFEFF" + JSON.stringify({ default_page_size: 5 }));

    expect(await store.load()).toEqual({ defaultPageSize: 5 });
  });

  it("should reject a file that is not JSON", async () => {
    await writeFile(store.path, "{not json");

    const error = await store.load().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ path: store.path, code: "CONFIG_ERROR" });
  });

  it("should reject an out-of-range page size on load", async () => {
    await writeFile(store.path, JSON.stringify({ default_page_size: 500 }));

    await expect(store.load()).rejects.toBeInstanceOf(ConfigError);
  });

  it("should refuse to save an invalid config", async () => {
    await expect(store.save({ defaultPageSize: 0 })).rejects.toBeInstanceOf(ConfigError);
    expect(await store.load()).toEqual({ defaultPageSize: 10 });
  });

  it("should create the directory on first save", async () => {
    const nested = new FileConfigStore({ dir: path.join(dir, "a", "b") });

    await nested.save({ defaultPageSize: 3 });

    expect(await nested.load()).toEqual({ defaultPageSize: 3 });
  });
});

describe("resolveConfigDir", () => {
  it("should prefer SNIPSTASH_CONFIG_DIR", () => {
    expect(resolveConfigDir({ env: { SNIPSTASH_CONFIG_DIR: "/tmp/cfg" }, platform: "linux", home: "/home/me" })).toBe(
      path.resolve("/tmp/cfg")
    );
  });

  it("should use XDG_CONFIG_HOME on Linux", () => {
    expect(resolveConfigDir({ env: { XDG_CONFIG_HOME: "/xdg" }, platform: "linux", home: "/home/me" })).toBe(
      path.join("/xdg", "snipstash")
    );
  });

  it("should fall back to ~/.config on Linux", () => {
    expect(resolveConfigDir({ env: {}, platform: "linux", home: "/home/me" })).toBe(
      path.join("/home/me", ".config", "snipstash")
    );
  });

  it("should use Application Support on macOS", () => {
    expect(resolveConfigDir({ env: {}, platform: "darwin", home: "/Users/me" })).toBe(
      path.join("/Users/me", "Library", "Application Support", "snipstash")
    );
  });

  it("should use APPDATA on Windows", () => {
    expect(
      resolveConfigDir({ env: { APPDATA: "C:\\Users\\me\\AppData\\Roaming" }, platform: "win32", home: "C:\\Users\\me" })
    ).toBe("C:\\Users\\me\\AppData\\Roaming\\snipstash");
  });
});

describe("normalizeServerUrl", () => {
  it("should strip trailing slashes and lower-case scheme and host", () => {
    expect(normalizeServerUrl(" HTTPS://Snippets.Example.COM/Api// ")).toBe("https://snippets.example.com/Api");
  });

  it("should leave a bare string alone apart from trimming", () => {
    expect(normalizeServerUrl("localhost:8080/")).toBe("localhost:8080");
  });
});
