/**
 * I/O helpers for CLI
 */

import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { FileInput, SnippetFile } from "@snipstash/sdk";
import { CliError } from "./errors.js";

/**
 * Where command output goes; stdout for results, stderr for diagnostics
 */
export interface Output {
  out(content: string): void;
  err(content: string): void;
  /** Whether stderr is a terminal (enables color) */
  errIsTTY: boolean;
}

/**
 * Output bound to the process streams
 */
export function processOutput(): Output {
  return {
    out: (content) => {
      process.stdout.write(content);
    },
    err: (content) => {
      process.stderr.write(content);
    },
    errIsTTY: process.stderr.isTTY ?? false,
  };
}

/**
 * Read the files to upload. Paths are resolved against `cwd`.
 * @throws {CliError} If no path is given, a path has ".." segments, or a file is missing
 */
export async function readInputFiles(paths: readonly string[], cwd: string): Promise<FileInput[]> {
  if (paths.length === 0) {
    throw new CliError("Provide at least one file");
  }

  const files: FileInput[] = [];
  for (const input of paths) {
    if (input.split(/[\\/]+/).some((segment) => segment === "..")) {
      throw new CliError(`File path must not contain ".." segments: ${input}`);
    }

    const resolved = path.resolve(cwd, input);
    let stat: Stats;
    try {
      stat = await fs.stat(resolved);
    } catch (err) {
      throw new CliError(`File does not exist: ${input}`, { cause: err });
    }
    if (!stat.isFile()) {
      throw new CliError(`Not a regular file: ${input}`);
    }

    files.push({ filename: path.basename(resolved), content: await fs.readFile(resolved) });
  }
  return files;
}

/**
 * Write snippet files into `dir`, creating it if needed. Existing files are
 * overwritten.
 * @returns Paths written, in file order
 * @throws {CliError} If a filename would land outside `dir`
 */
export async function writeSnippetFiles(dir: string, files: readonly SnippetFile[]): Promise<string[]> {
  const root = path.resolve(dir);
  const targets = files.map((file) => {
    const target = path.resolve(root, file.filename);
    const relative = path.relative(root, target);
    if (!relative || path.isAbsolute(relative) || relative !== path.basename(target)) {
      throw new CliError(`Refusing to write "${file.filename}" outside ${root}`);
    }
    return { target, content: file.content };
  });

  await fs.mkdir(root, { recursive: true });
  for (const { target, content } of targets) {
    await fs.writeFile(target, content, "utf8");
  }
  return targets.map(({ target }) => target);
}
