/**
 * SecretBackend implementations
 *
 * - KeyringSecretBackend: OS credential manager (Keychain, Credential Manager,
 *   Secret Service) through @napi-rs/keyring
 * - FileSecretBackend: owner-only JSON file for machines without a credential manager
 */

import * as path from "node:path";
import { atomicWrite, readTextIfExists } from "./io.js";
import { CREDENTIALS_FILE_NAME, resolveConfigDir } from "./paths.js";
import type { SecretBackend } from "./types.js";

type KeyringModule = typeof import("@napi-rs/keyring");

/**
 * OS keyring backend. The native module is loaded on first use so that
 * importing the SDK never requires it.
 */
export class KeyringSecretBackend implements SecretBackend {
  #module: Promise<KeyringModule> | null = null;

  #load(): Promise<KeyringModule> {
    this.#module ??= import("@napi-rs/keyring");
    return this.#module;
  }

  async getPassword(service: string, account: string): Promise<string | null> {
    const { Entry } = await this.#load();
    return new Entry(service, account).getPassword() ?? null;
  }

  async setPassword(service: string, account: string, secret: string): Promise<void> {
    const { Entry } = await this.#load();
    new Entry(service, account).setPassword(secret);
  }

  async deletePassword(service: string, account: string): Promise<boolean> {
    const { Entry } = await this.#load();
    const entry = new Entry(service, account);
    if ((entry.getPassword() ?? null) === null) {
      return false;
    }
    return entry.deletePassword();
  }
}

type SecretsFile = Record<string, Record<string, string>>;

/**
 * Secrets kept in `<config dir>/credentials.json`, mode 0o600, keyed by
 * service then account. Never the same file as the config.
 */
export class FileSecretBackend implements SecretBackend {
  readonly path: string;

  constructor(options: { dir?: string } = {}) {
    this.path = path.join(options.dir ?? resolveConfigDir(), CREDENTIALS_FILE_NAME);
  }

  async #read(): Promise<SecretsFile> {
    const content = await readTextIfExists(this.path);
    if (content === null) {
      return {};
    }
    const data: unknown = JSON.parse(content);
    if (!isSecretsFile(data)) {
      throw new Error(`Unexpected structure in ${this.path}`);
    }
    return data;
  }

  async getPassword(service: string, account: string): Promise<string | null> {
    const data = await this.#read();
    return data[service]?.[account] ?? null;
  }

  async setPassword(service: string, account: string, secret: string): Promise<void> {
    const data = await this.#read();
    data[service] = { ...data[service], [account]: secret };
    await atomicWrite(this.path, JSON.stringify(data, null, 2) + "\n");
  }

  async deletePassword(service: string, account: string): Promise<boolean> {
    const data = await this.#read();
    const entries = data[service];
    if (!entries || !(account in entries)) {
      return false;
    }
    delete entries[account];
    await atomicWrite(this.path, JSON.stringify(data, null, 2) + "\n");
    return true;
  }
}

function isSecretsFile(value: unknown): value is SecretsFile {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(
    (entries) =>
      typeof entries === "object" &&
      entries !== null &&
      !Array.isArray(entries) &&
      Object.values(entries).every((secret) => typeof secret === "string")
  );
}

/**
 * Pick the backend named by SNIPSTASH_CREDENTIAL_STORE ("keyring" or "file")
 */
export function createSecretBackend(
  kind: string | undefined = process.env.SNIPSTASH_CREDENTIAL_STORE,
  options: { dir?: string } = {}
): SecretBackend {
  if (kind === "file") {
    return new FileSecretBackend(options);
  }
  return new KeyringSecretBackend();
}
