/**
 * Per-user config locations
 */

import { homedir } from "node:os";
import * as path from "node:path";

export const APP_NAME = "snipstash";
export const CONFIG_FILE_NAME = "config.json";
export const CREDENTIALS_FILE_NAME = "credentials.json";

export interface ConfigDirOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  home?: string;
}

/**
 * Resolve the directory holding the config file
 *
 * Priority: SNIPSTASH_CONFIG_DIR > platform convention
 * - Linux and other Unix: $XDG_CONFIG_HOME/snipstash, else ~/.config/snipstash
 * - macOS: ~/Library/Application Support/snipstash
 * - Windows: %APPDATA%\snipstash, else ~\AppData\Roaming\snipstash
 */
export function resolveConfigDir(options: ConfigDirOptions = {}): string {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const home = options.home ?? homedir();

  const override = env.SNIPSTASH_CONFIG_DIR;
  if (override) {
    return path.resolve(override);
  }

  switch (platform) {
    case "darwin":
      return path.join(home, "Library", "Application Support", APP_NAME);
    case "win32":
      return path.win32.join(env.APPDATA ?? path.win32.join(home, "AppData", "Roaming"), APP_NAME);
    default:
      return path.join(env.XDG_CONFIG_HOME || path.join(home, ".config"), APP_NAME);
  }
}

/**
 * Normalize a server URL for use as a credential key and config value.
 * Trailing slashes are removed; scheme and host are lower-cased.
 */
export function normalizeServerUrl(url: string): string {
  const trimmed = url.trim().replace(/\/+$/, "");
  const match = /^([a-z][a-z0-9+.-]*:\/\/)([^/?#]*)(.*)$/i.exec(trimmed);
  if (!match) {
    return trimmed;
  }
  const [, scheme = "", host = "", rest = ""] = match;
  return `${scheme.toLowerCase()}${host.toLowerCase()}${rest}`;
}
