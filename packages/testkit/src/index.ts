/**
 * Test helpers shared by the snipstash packages
 */

export { FakeSnippetServer } from "./fake-server.js";
export type {
  FakeServerOptions,
  InjectedFailure,
  RecordedRequest,
  StoredFile,
  StoredSnippet,
} from "./fake-server.js";
export { MemoryConfigStore, MemorySecretBackend } from "./memory.js";
export { createTempDir, removeDir } from "./fs.js";
