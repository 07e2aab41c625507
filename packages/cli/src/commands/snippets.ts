/**
 * Snippet commands: create, list, get, update, delete, search
 */

import * as path from "node:path";
import { Option, type Command } from "commander";
import { SORT_ORDERS, type Snippet, type SortOrder, type Visibility } from "@snipstash/sdk";
import { type CliContext, ensureLoggedIn, note } from "../lib/context.js";
import { parseCategories, parsePageSize, parsePositiveInt, parseSort } from "../lib/arg.js";
import { CliError } from "../lib/errors.js";
import { readInputFiles, writeSnippetFiles } from "../lib/io.js";
import { formatPageFooter, formatSnippetLine, printJson, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

interface MetadataFlags {
  title?: string;
  description?: string;
  public?: boolean;
  private?: boolean;
  categories?: string;
}

interface Metadata {
  title: string;
  description: string;
  visibility: Visibility;
  categories: string[];
}

const parseId = (value: string): number => parsePositiveInt(value, "id");

function addMetadataOptions(command: Command): Command {
  return command
    .option("--title <title>", "Snippet title")
    .option("--description <text>", "Snippet description")
    .addOption(new Option("--public", "Make the snippet public").conflicts("private"))
    .option("--private", "Make the snippet private")
    .option("--categories <list>", "Comma-separated categories, e.g. ts,cli");
}

/**
 * Fill in snippet fields from flags, then prompts (interactive only), then
 * `current` (update). Without a terminal, a new snippet needs --title.
 */
async function resolveMetadata(ctx: CliContext, flags: MetadataFlags, current?: Snippet): Promise<Metadata> {
  const { prompter, interactive } = ctx;

  let title = flags.title;
  if (title === undefined) {
    if (interactive) {
      title = await prompter.ask("Title", current?.title);
    } else if (current) {
      title = current.title;
    } else {
      throw new CliError("--title is required when not running interactively");
    }
  }

  let description = flags.description;
  if (description === undefined) {
    description = interactive
      ? await prompter.ask("Description (optional)", current?.description)
      : (current?.description ?? "");
  }

  let visibility: Visibility;
  if (flags.public) {
    visibility = "public";
  } else if (flags.private) {
    visibility = "private";
  } else if (interactive) {
    visibility = (await prompter.confirm("Make it public?", current?.visibility === "public")) ? "public" : "private";
  } else {
    visibility = current?.visibility ?? "private";
  }

  let categories: string[];
  if (flags.categories !== undefined) {
    categories = parseCategories(flags.categories);
  } else if (interactive) {
    categories = parseCategories(
      await prompter.ask("Categories (comma-separated, e.g. ts,cli)", current?.categories.join(","))
    );
  } else {
    categories = current?.categories ?? [];
  }

  return { title, description, visibility, categories };
}

export function registerSnippetCommands(program: Command, ctx: CliContext): void {
  addMetadataOptions(
    program
      .command("create")
      .description("Create a snippet from one or more files")
      .argument("<files...>", "Files to upload")
  )
    .option("--json", "Print the created snippet as JSON")
    .addHelpText(
      "after",
      `
Examples:
  $ snipstash create retry.ts
  $ snipstash create main.py util.py --title "CLI skeleton" --public --categories python,cli`
    )
    .action(async (paths: string[], options: MetadataFlags & { json?: boolean }) => {
      await withTiming("cli.create", async () => {
        await ensureLoggedIn(ctx);
        const files = await readInputFiles(paths, ctx.cwd);
        const metadata = await resolveMetadata(ctx, options);

        const snippet = await ctx.service.create({ ...metadata, files });

        if (options.json) {
          printJson(ctx.output, snippet);
        } else {
          note(program, ctx, `Created snippet ${snippet.id}: ${snippet.title}`);
        }
      });
    });

  program
    .command("list")
    .description("List snippets")
    .option("-a, --all", "Fetch every page")
    .addOption(
      new Option("-n, --number <n>", "Snippets per page (default: from config)").argParser((value) =>
        parsePageSize(value, "--number")
      )
    )
    .addOption(
      new Option("-p, --page <n>", "Page to show")
        .argParser((value) => parsePositiveInt(value, "--page"))
        .conflicts("all")
    )
    .option("--json", "Output as JSON")
    .action(async (options: { all?: boolean; number?: number; page?: number; json?: boolean }) => {
      await withTiming("cli.list", async () => {
        if (options.all) {
          const items = await ctx.service.list({ all: true, pageSize: options.number });
          if (options.json) {
            printJson(ctx.output, items);
          } else if (items.length === 0) {
            note(program, ctx, "No snippets found");
          } else {
            printLines(ctx.output, items.map(formatSnippetLine));
          }
          return;
        }

        const page = await ctx.service.list({ page: options.page, pageSize: options.number });
        if (options.json) {
          printJson(ctx.output, page);
          return;
        }
        printLines(ctx.output, page.items.map(formatSnippetLine));
        note(program, ctx, page.items.length === 0 ? "No snippets found" : formatPageFooter(page));
      });
    });

  program
    .command("get")
    .description("Download a snippet's files")
    .argument("<id>", "Snippet id", parseId)
    .option("-o, --output <dir>", "Directory to write the files into (default: current directory)")
    .option("--json", "Print the snippet as JSON instead of writing files")
    .action(async (id: number, options: { output?: string; json?: boolean }) => {
      await withTiming("cli.get", async () => {
        const snippet = await ctx.service.get(id);

        if (options.json) {
          printJson(ctx.output, snippet);
          return;
        }

        const written = await writeSnippetFiles(path.resolve(ctx.cwd, options.output ?? "."), snippet.files);
        for (const file of written) {
          note(program, ctx, `Wrote ${file}`);
        }
      });
    });

  addMetadataOptions(
    program
      .command("update")
      .description("Replace a snippet's fields and files")
      .argument("<id>", "Snippet id", parseId)
      .argument("<files...>", "New file set; files not listed are removed")
  ).action(async (id: number, paths: string[], options: MetadataFlags) => {
    await withTiming("cli.update", async () => {
      await ensureLoggedIn(ctx);
      const files = await readInputFiles(paths, ctx.cwd);
      const current = await ctx.service.get(id);
      const metadata = await resolveMetadata(ctx, options, current);

      const snippet = await ctx.service.update(id, { ...metadata, files });

      note(program, ctx, `Updated snippet ${snippet.id}: ${snippet.title}`);
    });
  });

  program
    .command("delete")
    .description("Delete a snippet")
    .argument("<id>", "Snippet id", parseId)
    .option("-f, --force", "Delete without asking")
    .action(async (id: number, options: { force?: boolean }) => {
      await withTiming("cli.delete", async () => {
        await ensureLoggedIn(ctx);

        if (!options.force) {
          if (!ctx.interactive) {
            throw new CliError("Use --force to confirm deletion in non-interactive mode");
          }
          if (!(await ctx.prompter.confirm(`Delete snippet ${id}?`))) {
            throw new CliError("Aborted by user");
          }
        }

        await ctx.service.delete(id);
        note(program, ctx, `Deleted snippet ${id}`);
      });
    });

  program
    .command("search")
    .description("Search snippet titles and descriptions")
    .argument("<query>", "Text to search for")
    .addOption(
      new Option("-s, --sort <order>", `Result order: ${SORT_ORDERS.join(", ")} (default: newest)`).argParser(parseSort)
    )
    .option("--search-code", "Also search file contents")
    .option("--json", "Output as JSON")
    .action(
      async (
        query: string,
        options: { sort?: SortOrder; searchCode?: boolean; json?: boolean }
      ) => {
        await withTiming("cli.search", async () => {
          const results = await ctx.service.search({
            text: query,
            sort: options.sort,
            searchCode: Boolean(options.searchCode),
          });

          if (options.json) {
            printJson(ctx.output, results);
          } else if (results.length === 0) {
            note(program, ctx, "No snippets matched");
          } else {
            printLines(ctx.output, results.map(formatSnippetLine));
          }
        });
      }
    );
}
