/**
 * File-backed configuration store
 *
 * Invariants:
 * - The file only ever holds `server_url` and `default_page_size`
 * - A missing file loads as defaults; a corrupt one is an error, never silently reset
 * - Saves are atomic and owner-only (0o600)
 */

import * as path from "node:path";
import { ConfigError } from "./errors.js";
import { atomicWrite, readTextIfExists } from "./io.js";
import { logger } from "./observability/logs.js";
import { CONFIG_FILE_NAME, resolveConfigDir } from "./paths.js";
import { ConfigFileSchema, DEFAULT_PAGE_SIZE, toConfigFile } from "./schemas.js";
import type { Config, ConfigStore } from "./types.js";

/**
 * Configuration used before anything has been saved
 */
export function defaultConfig(): Config {
  return { defaultPageSize: DEFAULT_PAGE_SIZE };
}

export interface FileConfigStoreOptions {
  /** Directory holding config.json (default: platform config dir) */
  dir?: string;
}

export class FileConfigStore implements ConfigStore {
  readonly path: string;

  constructor(options: FileConfigStoreOptions = {}) {
    this.path = path.join(options.dir ?? resolveConfigDir(), CONFIG_FILE_NAME);
  }

  async load(): Promise<Config> {
    let content: string | null;
    try {
      content = await readTextIfExists(this.path);
    } catch (err) {
      throw new ConfigError(this.path, "cannot read file", { cause: err });
    }

    if (content === null) {
      logger.debug("config.defaults", { message: `no config at ${this.path}` });
      return defaultConfig();
    }

    let raw: unknown;
    try {
      // Strip BOM if present
      raw = JSON.parse(content.charCodeAt(0) === 0xfeff ? content.slice(1) : content);
    } catch (err) {
      throw new ConfigError(this.path, "file is not valid JSON", { cause: err });
    }

    const result = ConfigFileSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(this.path, formatIssues(result.error.issues), { cause: result.error });
    }
    return result.data;
  }

  async save(config: Config): Promise<void> {
    const data = toConfigFile(config);
    const result = ConfigFileSchema.safeParse(data);
    if (!result.success) {
      throw new ConfigError(this.path, formatIssues(result.error.issues), { cause: result.error });
    }

    try {
      await atomicWrite(this.path, JSON.stringify(data, null, 2) + "\n");
    } catch (err) {
      throw new ConfigError(this.path, "cannot write file", { cause: err });
    }
    logger.debug("config.saved", { message: this.path });
  }
}

function formatIssues(issues: ReadonlyArray<{ path: (string | number)[]; message: string }>): string {
  return issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
