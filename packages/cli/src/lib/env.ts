/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { DEFAULT_TIMEOUT_MS, resolveConfigDir } from "@snipstash/sdk";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the config directory
 * Priority: SNIPSTASH_CONFIG_DIR (with ~ expanded) > platform convention
 */
export function resolveCliConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.SNIPSTASH_CONFIG_DIR;
  if (override) {
    return path.resolve(expandTilde(override));
  }
  return resolveConfigDir({ env });
}

/**
 * Per-request timeout from SNIPSTASH_TIMEOUT_MS, else the SDK default.
 * Unparseable or non-positive values fall back to the default.
 */
export function resolveTimeoutMs(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.SNIPSTASH_TIMEOUT_MS?.trim();
  if (!raw || !/^\d+$/.test(raw)) {
    return DEFAULT_TIMEOUT_MS;
  }
  const parsed = Number.parseInt(raw, 10);
  return parsed > 0 ? parsed : DEFAULT_TIMEOUT_MS;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.SNIPSTASH_CLI_DEBUG === "1";
}

/**
 * Check if stdin and stdout are both a terminal
 */
export function isInteractive(): boolean {
  return (process.stdin.isTTY ?? false) && (process.stdout.isTTY ?? false);
}
