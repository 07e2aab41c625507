/**
 * Atomic file I/O for the config and credential files
 *
 * Invariants:
 * - Writes are atomic: readers never observe partial file contents
 * - Temp files reside in the same directory as the target (same filesystem for rename)
 * - Temp files are removed on failure paths
 * - Files are created owner read/write only (0o600)
 *
 * Pattern: write → fsync → rename
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";

/**
 * Atomically write UTF-8 content to a file, creating parent directories
 * @param filePath - Target file path
 * @param content - Content to write
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  await fs.mkdir(dir, { recursive: true });

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content, "utf-8");

    try {
      await fileHandle.datasync();
    } catch (err: unknown) {
      // ENOTSUP/ENOSYS: not supported on this platform; EINVAL: some FUSE mounts
      const code = errorCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    // Last writer wins when two invocations save at once
    await fs.rename(tmp, filePath);
    // rename keeps the temp file's mode, but an older file may have been looser
    await fs.chmod(filePath, 0o600);
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch(() => undefined);
    }
    await fs.rm(tmp, { force: true }).catch(() => undefined);
    throw err;
  }
}

/**
 * Read a UTF-8 file
 * @returns The file contents, or null if the file does not exist
 */
export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (errorCode(err) === "ENOENT") {
      return null;
    }
    throw err;
  }
}

/**
 * Extract the `code` of a Node.js system error
 */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
