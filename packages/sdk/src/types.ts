/**
 * Core type definitions for the SnipStash SDK
 */

/**
 * Snippet visibility on the server
 */
export type Visibility = "public" | "private";

/**
 * Ordering applied to search results
 */
export type SortOrder = "newest" | "oldest" | "alpha-asc" | "alpha-desc";

/**
 * Non-secret client configuration, persisted by a ConfigStore
 */
export interface Config {
  /** Base URL of the snippet service; absent until the first login */
  serverUrl?: string;
  /** Page size used when a listing does not specify one */
  defaultPageSize: number;
}

/**
 * A file stored in a snippet
 */
export interface SnippetFile {
  filename: string;
  content: string;
  language?: string;
}

/**
 * A snippet with full file contents
 */
export interface Snippet {
  /** Server-assigned, never changes */
  id: number;
  title: string;
  description: string;
  visibility: Visibility;
  /** Set semantics, kept in first-seen order */
  categories: string[];
  /** Ordered as stored on the server */
  files: SnippetFile[];
  createdAt: string;
  updatedAt: string;
}

/**
 * Snippet as returned by listings: file names without contents
 */
export interface SnippetSummary extends Omit<Snippet, "files"> {
  files: Array<Omit<SnippetFile, "content">>;
}

/**
 * One page of a snippet listing
 */
export interface Page<T = SnippetSummary> {
  items: T[];
  /** 1-based page number */
  page: number;
  pageSize: number;
  /** Total number of items across all pages */
  total: number;
}

/**
 * A file to upload
 */
export interface FileInput {
  filename: string;
  content: string | Uint8Array;
  /** MIME type of the part; guessed from the extension when omitted */
  contentType?: string;
}

/**
 * Fields sent on create and on (full-replace) update
 */
export interface SnippetInput {
  title: string;
  description: string;
  visibility: Visibility;
  categories: string[];
  files: FileInput[];
}

/**
 * Search request
 */
export interface SearchQuery {
  text: string;
  sort?: SortOrder;
  /** Also match file contents, not just titles and descriptions */
  searchCode?: boolean;
}

/**
 * Options for a listing
 */
export interface ListOptions {
  /** 1-based page number (default: 1); ignored when `all` is set */
  page?: number;
  /** Page size (default: config `defaultPageSize`) */
  pageSize?: number;
  /** Fetch every page and return the concatenated items */
  all?: boolean;
}

/**
 * Credentials attached to every authenticated request
 */
export interface AuthContext {
  serverUrl: string;
  token: string;
}

/**
 * Session state as seen by callers
 */
export type SessionStatus =
  | { state: "unauthenticated"; serverUrl?: string }
  | { state: "authenticated"; serverUrl: string };

/**
 * Persists non-secret configuration
 */
export interface ConfigStore {
  /** Location of the backing file, for messages */
  readonly path: string;
  /**
   * Load the configuration
   * @returns Defaults when nothing has been saved yet
   * @throws {ConfigError} If the stored configuration cannot be read or parsed
   */
  load(): Promise<Config>;
  /**
   * Persist the configuration
   * @throws {ConfigError} If it cannot be written
   */
  save(config: Config): Promise<void>;
}

/**
 * Low-level secret storage, addressed by service and account
 */
export interface SecretBackend {
  /** Returns null when nothing is stored */
  getPassword(service: string, account: string): Promise<string | null>;
  setPassword(service: string, account: string, secret: string): Promise<void>;
  /** Returns false when nothing was stored */
  deletePassword(service: string, account: string): Promise<boolean>;
}

/**
 * Minimal fetch signature the ApiClient depends on
 */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;
