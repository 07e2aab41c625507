#!/usr/bin/env node

/**
 * SnipStash CLI entry point
 */

import { openCliClient } from "./lib/client.js";
import { isInteractive } from "./lib/env.js";
import { processOutput } from "./lib/io.js";
import { TerminalPrompter } from "./lib/prompt.js";
import { runCli } from "./program.js";

async function main(): Promise<void> {
  const { service, configStore } = openCliClient();
  process.exitCode = await runCli(process.argv.slice(2), {
    service,
    configStore,
    prompter: new TerminalPrompter(),
    output: processOutput(),
    cwd: process.cwd(),
    interactive: isInteractive(),
  });
}

main().catch((err: unknown) => {
  process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
});
