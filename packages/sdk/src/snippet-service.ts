/**
 * Snippet operations against the remote service
 */

import { ApiClient } from "./api-client.js";
import { FileConfigStore } from "./config-store.js";
import { CredentialVault } from "./credential-vault.js";
import { PaginationError, ValidationError } from "./errors.js";
import { encodeSnippetForm } from "./multipart.js";
import { logger } from "./observability/logs.js";
import {
  ApiKeyResponseSchema,
  LoginResponseSchema,
  PageSchema,
  SnippetListSchema,
  SnippetSchema,
} from "./schemas.js";
import { createSecretBackend } from "./secret-backends.js";
import { Session } from "./session.js";
import { sortSnippets } from "./sort.js";
import type {
  ConfigStore,
  FetchLike,
  ListOptions,
  Page,
  SearchQuery,
  SecretBackend,
  SessionStatus,
  Snippet,
  SnippetInput,
  SnippetSummary,
} from "./types.js";
import {
  validateId,
  validatePageNumber,
  validatePageSize,
  validateSearchQuery,
  validateServerUrl,
  validateSnippetInput,
} from "./validation.js";

export interface SnippetServiceOptions {
  configStore: ConfigStore;
  vault: CredentialVault;
  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike;
  /** Per-request deadline in milliseconds (default: 30s) */
  timeoutMs?: number;
}

/**
 * Snippet service client
 *
 * Every data operation checks the session first and fails with
 * AuthRequiredError without touching the network when there is none.
 * Nothing is retried.
 *
 * @example
 * ```typescript
 * const client = openSnippetClient();
 *
 * await client.login("https://snippets.example.com", apiKey);
 *
 * const snippet = await client.create({
 *   title: "Retry helper",
 *   description: "",
 *   visibility: "private",
 *   categories: ["ts"],
 *   files: [{ filename: "retry.ts", content: source }],
 * });
 *
 * for await (const page of client.pages()) {
 *   console.log(page.items.map((s) => s.title));
 * }
 * ```
 */
export class SnippetService {
  #configStore: ConfigStore;
  #session: Session;
  #client: ApiClient;

  constructor(options: SnippetServiceOptions) {
    this.#configStore = options.configStore;
    this.#session = new Session(options.configStore, options.vault);
    this.#client = new ApiClient({
      credentials: () => this.#session.requireAuth(),
      fetch: options.fetch,
      timeoutMs: options.timeoutMs,
    });
  }

  /**
   * Session state
   */
  status(): Promise<SessionStatus> {
    return this.#session.status();
  }

  /**
   * Verify an API key with one lightweight request, then persist the server
   * URL and the key. Nothing is stored if the probe fails.
   * @throws {ValidationError} For a malformed URL or empty key
   * @throws {ApiError} If the probe fails (UnauthorizedError for a bad key)
   */
  async login(serverUrl: string, apiKey: string): Promise<void> {
    const url = validateServerUrl(serverUrl);
    if (!apiKey.trim()) {
      throw new ValidationError([{ path: "apiKey", message: "API key must not be empty" }]);
    }
    const token = apiKey.trim();

    await this.#client
      .withCredentials({ serverUrl: url, token })
      .request({ method: "GET", path: "/snippets", query: { page: 1, page_size: 1 } }, PageSchema);

    await this.#session.establish(url, token);
  }

  /**
   * Sign in with a username and password and create a named API key.
   * The key is returned, not stored; pass it to `login`.
   */
  async exchangePassword(
    serverUrl: string,
    username: string,
    password: string,
    keyName: string
  ): Promise<string> {
    const url = validateServerUrl(serverUrl);
    const issues = [
      ...(username.trim() ? [] : [{ path: "username", message: "username is required" }]),
      ...(password ? [] : [{ path: "password", message: "password is required" }]),
      ...(keyName.trim() ? [] : [{ path: "keyName", message: "key name is required" }]),
    ];
    if (issues.length) {
      throw new ValidationError(issues);
    }

    const { token } = await this.#client
      .withoutCredentials(url)
      .request(
        { method: "POST", path: "/auth/login", body: { json: { username: username.trim(), password } } },
        LoginResponseSchema
      );

    const { key } = await this.#client
      .withCredentials({ serverUrl: url, token })
      .request({ method: "POST", path: "/keys", body: { json: { name: keyName.trim() } } }, ApiKeyResponseSchema);

    return key;
  }

  /**
   * Forget the stored API key
   */
  logout(): Promise<void> {
    return this.#session.clear();
  }

  /**
   * Create a snippet from fields and files
   * @returns The snippet as stored, with its server-assigned id
   */
  async create(input: SnippetInput): Promise<Snippet> {
    await this.#session.requireAuth();
    const valid = validateSnippetInput(input);
    const snippet = await this.#client.request(
      { method: "POST", path: "/snippets", body: { form: encodeSnippetForm(valid) } },
      SnippetSchema
    );
    logger.debug("snippet.created", { details: { id: snippet.id, files: snippet.files.length } });
    return snippet;
  }

  /**
   * One page of the listing, or every item when `all` is set
   *
   * With `all`, pages are requested one at a time from page 1 and their items
   * concatenated in page order until the reported total is reached. If any
   * request fails, nothing is returned: a PaginationError reports the last
   * page fetched and wraps the failure.
   */
  async list(options: ListOptions & { all: true }): Promise<SnippetSummary[]>;
  async list(options?: ListOptions & { all?: false }): Promise<Page>;
  async list(options?: ListOptions): Promise<Page | SnippetSummary[]>;
  async list(options: ListOptions = {}): Promise<Page | SnippetSummary[]> {
    await this.#session.requireAuth();
    const pageSize = await this.#pageSize(options.pageSize);

    if (!options.all) {
      return this.#fetchPage(validatePageNumber(options.page ?? 1), pageSize);
    }

    const items: SnippetSummary[] = [];
    let lastFetchedPage = 0;
    try {
      for await (const page of this.#walk(pageSize)) {
        items.push(...page.items);
        lastFetchedPage = page.page;
      }
    } catch (err) {
      throw new PaginationError(lastFetchedPage, lastFetchedPage + 1, err);
    }
    return items;
  }

  /**
   * Lazily fetch pages in ascending order, starting at page 1 on every call.
   * Stop iterating to stop fetching.
   */
  async *pages(options: { pageSize?: number } = {}): AsyncGenerator<Page, void, undefined> {
    await this.#session.requireAuth();
    const pageSize = await this.#pageSize(options.pageSize);
    yield* this.#walk(pageSize);
  }

  async *#walk(pageSize: number): AsyncGenerator<Page, void, undefined> {
    let fetched = 0;
    for (let pageNumber = 1; ; pageNumber++) {
      const page = await this.#fetchPage(pageNumber, pageSize);
      yield page;
      fetched += page.items.length;
      // An empty page ends the walk even if the server's total disagrees
      if (fetched >= page.total || page.items.length === 0) {
        return;
      }
    }
  }

  async #fetchPage(page: number, pageSize: number): Promise<Page> {
    return this.#client.request(
      { method: "GET", path: "/snippets", query: { page, page_size: pageSize } },
      PageSchema
    );
  }

  async #pageSize(requested: number | undefined): Promise<number> {
    if (requested !== undefined) {
      return validatePageSize(requested);
    }
    const config = await this.#configStore.load();
    return config.defaultPageSize;
  }

  /**
   * Fetch a snippet with file contents
   * @throws {NotFoundError} If no snippet has this id
   */
  async get(id: number): Promise<Snippet> {
    await this.#session.requireAuth();
    const valid = validateId(id);
    return this.#client.request({ method: "GET", path: `/snippets/${valid}` }, SnippetSchema);
  }

  /**
   * Replace a snippet's fields and its entire file set. Files not present in
   * `input.files` are removed; partial updates are not supported.
   * @throws {NotFoundError} If no snippet has this id
   */
  async update(id: number, input: SnippetInput): Promise<Snippet> {
    await this.#session.requireAuth();
    const validId = validateId(id);
    const valid = validateSnippetInput(input);
    const snippet = await this.#client.request(
      { method: "PUT", path: `/snippets/${validId}`, body: { form: encodeSnippetForm(valid) } },
      SnippetSchema
    );
    logger.debug("snippet.updated", { details: { id: snippet.id, files: snippet.files.length } });
    return snippet;
  }

  /**
   * Delete a snippet. Asks for no confirmation; that is up to the caller.
   * @throws {NotFoundError} If no snippet has this id
   */
  async delete(id: number): Promise<void> {
    await this.#session.requireAuth();
    const valid = validateId(id);
    await this.#client.requestNoContent({ method: "DELETE", path: `/snippets/${valid}` });
    logger.debug("snippet.deleted", { details: { id: valid } });
  }

  /**
   * Search titles and descriptions (and file contents with `searchCode`).
   * Results are ordered locally so the order is deterministic.
   */
  async search(query: SearchQuery): Promise<Snippet[]> {
    await this.#session.requireAuth();
    const valid = validateSearchQuery(query);
    const results = await this.#client.request(
      {
        method: "GET",
        path: "/snippets/search",
        query: { q: valid.text, sort: valid.sort, search_code: valid.searchCode },
      },
      SnippetListSchema
    );
    return sortSnippets(results, valid.sort);
  }
}

export interface OpenSnippetClientOptions {
  /** Config store (default: FileConfigStore in the platform config dir) */
  configStore?: ConfigStore;
  /** Secret backend (default: chosen by SNIPSTASH_CREDENTIAL_STORE) */
  secrets?: SecretBackend;
  fetch?: FetchLike;
  timeoutMs?: number;
}

/**
 * Open a snippet client with default local storage
 */
export function openSnippetClient(options: OpenSnippetClientOptions = {}): SnippetService {
  return new SnippetService({
    configStore: options.configStore ?? new FileConfigStore(),
    vault: new CredentialVault(options.secrets ?? createSecretBackend()),
    fetch: options.fetch,
    timeoutMs: options.timeoutMs,
  });
}
