/**
 * Session commands: login, logout, status
 */

import type { Command } from "commander";
import { type CliContext, note } from "../lib/context.js";
import { formatStatus } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

export const DEFAULT_KEY_NAME = "snipstash-cli";

export function registerAuthCommands(program: Command, ctx: CliContext): void {
  program
    .command("login")
    .description("Log in to a snippet server and store the API key")
    .argument("<server-url>", "Server base URL, e.g. https://snippets.example.com")
    .addHelpText(
      "after",
      `
Leave the API key empty to sign in with username and password instead;
a new API key is then created on the server and stored.`
    )
    .action(async (serverUrl: string) => {
      await withTiming("cli.login", async () => {
        let apiKey = (
          await ctx.prompter.secret("API key (leave empty to sign in with username and password)")
        ).trim();

        if (!apiKey) {
          const username = await ctx.prompter.ask("Username");
          const password = await ctx.prompter.secret("Password");
          const keyName = await ctx.prompter.ask("Name for the new API key", DEFAULT_KEY_NAME);
          apiKey = await ctx.service.exchangePassword(serverUrl, username, password, keyName);
        }

        await ctx.service.login(serverUrl, apiKey);
        note(program, ctx, formatStatus(await ctx.service.status()));
      });
    });

  program
    .command("logout")
    .description("Forget the stored API key")
    .action(async () => {
      await withTiming("cli.logout", async () => {
        await ctx.service.logout();
        note(program, ctx, "Logged out");
      });
    });

  program
    .command("status")
    .description("Show whether you are logged in, and where")
    .action(async () => {
      await withTiming("cli.status", async () => {
        ctx.output.out(formatStatus(await ctx.service.status()) + "\n");
      });
    });
}
