import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, stat } from "node:fs/promises";
import * as path from "node:path";
import { MemorySecretBackend, createTempDir, removeDir } from "@snipstash/testkit";
import { CredentialVault, VAULT_SERVICE } from "./credential-vault.js";
import { CredentialError, CredentialNotFoundError } from "./errors.js";
import { FileSecretBackend, KeyringSecretBackend, createSecretBackend } from "./secret-backends.js";

describe("CredentialVault", () => {
  let backend: MemorySecretBackend;
  let vault: CredentialVault;

  beforeEach(() => {
    backend = new MemorySecretBackend();
    vault = new CredentialVault(backend);
  });

  it("should store and retrieve a token", async () => {
    await vault.store("https://x.tld", "test-secret");

    expect(await vault.retrieve("https://x.tld")).toBe("test-secret");
    expect(backend.entries.get(`${VAULT_SERVICE}\u0000https://x.tld`)).toBe("test-secret");
  });

  it("should key entries by normalized URL", async () => {
    await vault.store("HTTPS://X.tld/", "test-secret");

    expect(await vault.retrieve("https://x.tld")).toBe("test-secret");
  });

  it("should replace an existing token", async () => {
    await vault.store("https://x.tld", "old-secret");
    await vault.store("https://x.tld", "new-secret");

    expect(await vault.retrieve("https://x.tld")).toBe("new-secret");
  });

  it("should keep servers apart", async () => {
    await vault.store("https://a.tld", "secret-a");
    await vault.store("https://b.tld", "secret-b");

    expect(await vault.retrieve("https://a.tld")).toBe("secret-a");
    expect(await vault.retrieve("https://b.tld")).toBe("secret-b");
  });

  it("should report a missing entry as CredentialNotFoundError", async () => {
    const error = await vault.retrieve("https://x.tld/").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CredentialNotFoundError);
    expect(error).toMatchObject({ serverUrl: "https://x.tld", code: "CREDENTIAL_NOT_FOUND" });
  });

  it("should make retrieve fail after delete", async () => {
    await vault.store("https://x.tld", "test-secret");

    expect(await vault.delete("https://x.tld")).toBe(true);
    await expect(vault.retrieve("https://x.tld")).rejects.toBeInstanceOf(CredentialNotFoundError);
  });

  it("should treat deleting an absent entry as success", async () => {
    expect(await vault.delete("https://x.tld")).toBe(false);
  });

  it("should wrap backend failures without the secret", async () => {
    backend.failWith = new Error("keychain locked");

    const error = await vault.store("https://x.tld", "test-secret").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CredentialError);
    expect(error).not.toBeInstanceOf(CredentialNotFoundError);
    expect(error).toMatchObject({
      code: "CREDENTIAL_ERROR",
      message: "Failed to store credential for https://x.tld",
    });
  });

  it("should wrap backend failures on retrieve and delete", async () => {
    backend.failWith = new Error("keychain locked");

    await expect(vault.retrieve("https://x.tld")).rejects.toBeInstanceOf(CredentialError);
    await expect(vault.delete("https://x.tld")).rejects.toBeInstanceOf(CredentialError);
  });
});

describe("FileSecretBackend", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("should keep secrets in credentials.json, keyed by service and account", async () => {
    const backend = new FileSecretBackend({ dir });
    const vault = new CredentialVault(backend);

    await vault.store("https://x.tld", "test-secret");

    expect(backend.path).toBe(path.join(dir, "credentials.json"));
    const raw: unknown = JSON.parse(await readFile(backend.path, "utf8"));
    expect(raw).toEqual({ snipstash: { "https://x.tld": "test-secret" } });
    expect(await new CredentialVault(new FileSecretBackend({ dir })).retrieve("https://x.tld")).toBe("test-secret");
  });

  it.skipIf(process.platform === "win32")("should write the file owner-only", async () => {
    const backend = new FileSecretBackend({ dir });
    await backend.setPassword(VAULT_SERVICE, "https://x.tld", "test-secret");

    const { mode } = await stat(backend.path);
    expect(mode & 0o777).toBe(0o600);
  });

  it("should delete one entry and leave the others", async () => {
    const backend = new FileSecretBackend({ dir });
    await backend.setPassword(VAULT_SERVICE, "https://a.tld", "secret-a");
    await backend.setPassword(VAULT_SERVICE, "https://b.tld", "secret-b");

    expect(await backend.deletePassword(VAULT_SERVICE, "https://a.tld")).toBe(true);
    expect(await backend.deletePassword(VAULT_SERVICE, "https://a.tld")).toBe(false);
    expect(await backend.getPassword(VAULT_SERVICE, "https://a.tld")).toBeNull();
    expect(await backend.getPassword(VAULT_SERVICE, "https://b.tld")).toBe("secret-b");
  });

  it("should return null when the file does not exist", async () => {
    expect(await new FileSecretBackend({ dir }).getPassword(VAULT_SERVICE, "https://x.tld")).toBeNull();
  });
});

describe("createSecretBackend", () => {
  it("should choose the file backend when asked", () => {
    expect(createSecretBackend("file", { dir: "/tmp/cfg" })).toBeInstanceOf(FileSecretBackend);
  });

  it("should default to the OS keyring", () => {
    expect(createSecretBackend("keyring")).toBeInstanceOf(KeyringSecretBackend);
  });
});
