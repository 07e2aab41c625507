/**
 * config command: show or change non-secret settings
 */

import { Option, type Command } from "commander";
import { type CliContext, note } from "../lib/context.js";
import { parsePageSize } from "../lib/arg.js";
import { printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

export function registerConfigCommand(program: Command, ctx: CliContext): void {
  program
    .command("config")
    .description("Show or change settings")
    .addOption(
      new Option("--page-size <n>", "Default number of snippets per page").argParser((value) =>
        parsePageSize(value, "--page-size")
      )
    )
    .action(async (options: { pageSize?: number }) => {
      await withTiming("cli.config", async () => {
        const config = await ctx.configStore.load();

        if (options.pageSize !== undefined) {
          await ctx.configStore.save({ ...config, defaultPageSize: options.pageSize });
          note(program, ctx, `default_page_size set to ${options.pageSize}`);
          return;
        }

        printLines(ctx.output, [
          `config_file: ${ctx.configStore.path}`,
          `server_url: ${config.serverUrl ?? "(not set)"}`,
          `default_page_size: ${config.defaultPageSize}`,
        ]);
      });
    });
}
