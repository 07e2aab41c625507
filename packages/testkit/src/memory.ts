/**
 * In-memory implementations of the SDK storage interfaces
 */

import { defaultConfig, type Config, type ConfigStore, type SecretBackend } from "@snipstash/sdk";

/**
 * SecretBackend held in a Map; `entries` exposes what was stored
 */
export class MemorySecretBackend implements SecretBackend {
  readonly entries = new Map<string, string>();
  /** When set, every call rejects with this error */
  failWith: Error | null = null;

  #key(service: string, account: string): string {
    return `${service}\u0000${account}`;
  }

  #check(): void {
    if (this.failWith) {
      throw this.failWith;
    }
  }

  async getPassword(service: string, account: string): Promise<string | null> {
    this.#check();
    return this.entries.get(this.#key(service, account)) ?? null;
  }

  async setPassword(service: string, account: string, secret: string): Promise<void> {
    this.#check();
    this.entries.set(this.#key(service, account), secret);
  }

  async deletePassword(service: string, account: string): Promise<boolean> {
    this.#check();
    return this.entries.delete(this.#key(service, account));
  }
}

/**
 * ConfigStore held in memory; `saves` counts writes
 */
export class MemoryConfigStore implements ConfigStore {
  readonly path = "memory://config.json";
  saves = 0;
  #config: Config;

  constructor(initial: Partial<Config> = {}) {
    this.#config = { ...defaultConfig(), ...initial };
  }

  async load(): Promise<Config> {
    return { ...this.#config };
  }

  async save(config: Config): Promise<void> {
    this.saves++;
    this.#config = { ...config };
  }
}
