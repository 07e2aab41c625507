/**
 * Basic Usage Example
 *
 * Logs in, then creates, lists, searches, reads, updates and deletes a snippet.
 * Config and credentials go to a throwaway directory with the file secret
 * backend, so your real login is untouched.
 *
 * Run with: SNIPSTASH_SERVER=https://snippets.example.com SNIPSTASH_API_KEY=... npx tsx examples/basic-usage.ts
 */

import { rm } from "node:fs/promises";
import { FileConfigStore, FileSecretBackend, NotFoundError, openSnippetClient } from "@snipstash/sdk";

async function main() {
  const serverUrl = process.env.SNIPSTASH_SERVER;
  const apiKey = process.env.SNIPSTASH_API_KEY;
  if (!serverUrl || !apiKey) {
    throw new Error("Set SNIPSTASH_SERVER and SNIPSTASH_API_KEY");
  }

  // Setup: isolated config directory
  const dir = "./examples-data/basic";
  await rm(dir, { recursive: true, force: true });

  const client = openSnippetClient({
    configStore: new FileConfigStore({ dir }),
    secrets: new FileSecretBackend({ dir }),
  });

  console.log("🔑 Logging in...");
  await client.login(serverUrl, apiKey);
  console.log("✅ Logged in");

  // CREATE
  console.log("\n✏️  Creating snippet...");
  const created = await client.create({
    title: "Retry helper",
    description: "Exponential backoff around a promise",
    visibility: "private",
    categories: ["ts", "async"],
    files: [
      {
        filename: "retry.ts",
        content: "export async function retry<T>(fn: () => Promise<T>): Promise<T> {\n  return fn();\n}\n",
      },
    ],
  });
  console.log(`✅ Created snippet ${created.id}`);

  // LIST: every page
  console.log("\n📋 Listing snippets...");
  const all = await client.list({ all: true });
  for (const s of all) {
    console.log(`   - ${s.id}: ${s.title} [${s.categories.join(", ")}]`);
  }

  // SEARCH
  console.log("\n🔍 Searching for 'retry'...");
  const hits = await client.search({ text: "retry", sort: "alpha-asc", searchCode: false });
  console.log(`✅ Found ${hits.length} snippet(s)`);

  // UPDATE: full replace of fields and files
  console.log("\n✏️  Updating snippet...");
  const updated = await client.update(created.id, {
    title: "Retry helper (v2)",
    description: created.description,
    visibility: "public",
    categories: created.categories,
    files: [{ filename: "retry.ts", content: "export const retry = <T>(fn: () => Promise<T>) => fn();\n" }],
  });
  console.log(`✅ Now ${updated.visibility}: ${updated.title}`);

  // DELETE
  console.log("\n🗑️  Deleting snippet...");
  await client.delete(created.id);
  try {
    await client.get(created.id);
    console.log("❌ Snippet still exists");
  } catch (err) {
    if (!(err instanceof NotFoundError)) {
      throw err;
    }
    console.log(`✅ Verified deletion: snippet ${created.id} not found`);
  }

  await client.logout();
  console.log("\n✅ Example completed successfully!");
}

main().catch(console.error);
