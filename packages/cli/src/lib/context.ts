/**
 * What every command needs, injected so tests can run the program in-process
 */

import type { Command } from "commander";
import { AuthRequiredError, type ConfigStore, type SnippetService } from "@snipstash/sdk";
import type { Output } from "./io.js";
import type { Prompter } from "./prompt.js";

export interface CliContext {
  service: SnippetService;
  configStore: ConfigStore;
  prompter: Prompter;
  output: Output;
  /** Directory relative paths are resolved against */
  cwd: string;
  /** Whether prompts can be answered by a person */
  interactive: boolean;
}

export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
  completions?: string;
}

export function globalOptions(program: Command): GlobalOptions {
  return program.opts<GlobalOptions>();
}

/**
 * Print a status line to stdout unless --quiet
 */
export function note(program: Command, ctx: CliContext, line: string): void {
  if (!globalOptions(program).quiet) {
    ctx.output.out(line + "\n");
  }
}

/**
 * Fail before prompting when there is no session
 * @throws {AuthRequiredError}
 */
export async function ensureLoggedIn(ctx: CliContext): Promise<void> {
  const status = await ctx.service.status();
  if (status.state !== "authenticated") {
    throw new AuthRequiredError(
      status.serverUrl !== undefined ? `Not logged in to ${status.serverUrl}` : "Not logged in: no server configured"
    );
  }
}
