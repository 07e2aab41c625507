/**
 * The snipstash command-line program
 */

import { Command, CommanderError, Option } from "commander";
import { registerAuthCommands } from "./commands/auth.js";
import { registerConfigCommand } from "./commands/config.js";
import { registerSnippetCommands } from "./commands/snippets.js";
import { SHELLS, generateCompletion, isShell } from "./lib/completion.js";
import { type CliContext, globalOptions } from "./lib/context.js";
import { isVerbose } from "./lib/env.js";
import { CliError, EXIT_OK, formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { colorize } from "./lib/render.js";
import { readCliVersion } from "./lib/version.js";

/**
 * Build the commander program around an injected context
 */
export function buildProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name("snipstash")
    .description("SnipStash - keep code snippets on a remote server")
    .version(readCliVersion())
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .addOption(new Option("--completions <shell>", "Print a shell completion script").choices(SHELLS))
    .configureOutput({
      writeOut: (str) => ctx.output.out(str),
      writeErr: (str) => ctx.output.err(str),
      outputError: (str, write) => write(colorize(str, "red", ctx.output.errIsTTY)),
    })
    .exitOverride();

  registerAuthCommands(program, ctx);
  registerSnippetCommands(program, ctx);
  registerConfigCommand(program, ctx);

  // Runs when no subcommand matched
  program.action(async (_options: unknown, command: Command) => {
    const shell = globalOptions(program).completions;
    if (shell !== undefined && isShell(shell)) {
      ctx.output.out(generateCompletion(program, shell));
      return;
    }
    const [unknown] = command.args;
    if (unknown !== undefined) {
      throw new CliError(`Unknown command '${unknown}'. See 'snipstash --help'.`);
    }
    program.help({ error: true });
  });

  return program;
}

/**
 * Run the program and return the exit code. Errors are printed, never thrown.
 */
export async function runCli(argv: readonly string[], ctx: CliContext): Promise<number> {
  const program = buildProgram(ctx);
  try {
    await program.parseAsync([...argv], { from: "user" });
    return EXIT_OK;
  } catch (err) {
    if (err instanceof CommanderError) {
      // Commander has already printed help, the version or a usage message
      return err.exitCode;
    }
    const verbose = Boolean(globalOptions(program).verbose) || isVerbose();
    ctx.output.err(colorize(`Error: ${formatCliError(err, verbose)}`, "red", ctx.output.errIsTTY) + "\n");
    return mapSdkErrorToExitCode(err);
  } finally {
    ctx.prompter.close();
  }
}
