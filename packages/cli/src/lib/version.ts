/**
 * CLI version from package.json
 */

import { readFileSync } from "node:fs";

export function readCliVersion(): string {
  // Same relative location from src/lib and dist/lib
  const pkg: unknown = JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}
