/**
 * SnipStash SDK
 *
 * Authenticated access to a remote snippet-storage service with local config
 * and OS secure storage for the API key
 */

// Re-export types
export type {
  Visibility,
  SortOrder,
  Config,
  SnippetFile,
  Snippet,
  SnippetSummary,
  Page,
  FileInput,
  SnippetInput,
  SearchQuery,
  ListOptions,
  AuthContext,
  SessionStatus,
  ConfigStore,
  SecretBackend,
  FetchLike,
} from "./types.js";

// Client
export { SnippetService, openSnippetClient } from "./snippet-service.js";
export type { SnippetServiceOptions, OpenSnippetClientOptions } from "./snippet-service.js";
export { Session } from "./session.js";
export { ApiClient, DEFAULT_TIMEOUT_MS, buildUrl, redactHeaders } from "./api-client.js";
export type { ApiClientOptions, ApiRequest, CredentialSource, HttpMethod, RequestBody } from "./api-client.js";
export { encodeSnippetForm, guessContentType } from "./multipart.js";
export { sortSnippets } from "./sort.js";

// Local storage
export { FileConfigStore, defaultConfig } from "./config-store.js";
export type { FileConfigStoreOptions } from "./config-store.js";
export { CredentialVault, VAULT_SERVICE } from "./credential-vault.js";
export { KeyringSecretBackend, FileSecretBackend, createSecretBackend } from "./secret-backends.js";
export { resolveConfigDir, normalizeServerUrl, CONFIG_FILE_NAME, CREDENTIALS_FILE_NAME } from "./paths.js";
export type { ConfigDirOptions } from "./paths.js";

// Validation and wire schemas
export {
  SORT_ORDERS,
  normalizeCategories,
  validateSnippetInput,
  validateSearchQuery,
  validateId,
  validatePageNumber,
  validatePageSize,
  validateServerUrl,
  parseSortOrder,
} from "./validation.js";
export { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE, SnippetSchema, PageSchema } from "./schemas.js";

// Observability
export { Logger, logger } from "./observability/logs.js";
export type { LogLevel, LogEntry, LogSink } from "./observability/logs.js";

export { SDK_VERSION } from "./version.js";

// Errors
export {
  SnipStashError,
  ConfigError,
  CredentialError,
  CredentialNotFoundError,
  AuthRequiredError,
  ValidationError,
  ApiError,
  UnauthorizedError,
  NotFoundError,
  RateLimitedError,
  ServerError,
  RequestFailedError,
  NetworkError,
  InvalidResponseError,
  PaginationError,
} from "./errors.js";
export type { ApiErrorKind, ValidationIssue, SnipStashErrorOptions } from "./errors.js";
