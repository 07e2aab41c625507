/**
 * In-process stand-in for the snippet service
 *
 * Exposes a `fetch` function that routes requests to an in-memory store, so
 * SDK and CLI tests exercise real request building and response parsing
 * without opening a socket.
 */

import type { FetchLike } from "@snipstash/sdk";

export interface StoredFile {
  filename: string;
  content: string;
  language?: string;
}

export interface StoredSnippet {
  id: number;
  title: string;
  description: string;
  visibility: "public" | "private";
  categories: string[];
  files: StoredFile[];
  created_at: string;
  updated_at: string;
}

/**
 * A request as the server saw it
 */
export interface RecordedRequest {
  method: string;
  url: URL;
  headers: Headers;
  body: RequestInit["body"];
}

/**
 * Canned failure returned instead of normal handling
 */
export interface InjectedFailure {
  /** Which requests fail */
  match: (req: RecordedRequest) => boolean;
  status?: number;
  body?: string;
  headers?: Record<string, string>;
  /** Reject like a dropped connection instead of answering */
  networkError?: boolean;
  /** Never answer; reject only when the request is aborted */
  hang?: boolean;
  /** Remove after the first match (default: true) */
  once?: boolean;
}

export interface FakeServerOptions {
  /** API keys accepted as bearer tokens */
  tokens?: string[];
  /** Accounts for POST /auth/login */
  users?: Array<{ username: string; password: string }>;
  /** First value of the fake clock (default: 2026-01-01T00:00:00Z) */
  startTime?: string;
}

const LANGUAGES: Record<string, string> = {
  ts: "typescript",
  js: "javascript",
  py: "python",
  md: "markdown",
  sh: "bash",
};

function json(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

export class FakeSnippetServer {
  readonly requests: RecordedRequest[] = [];
  readonly tokens: Set<string>;
  readonly snippets = new Map<number, StoredSnippet>();

  #users: Array<{ username: string; password: string }>;
  #sessions = new Set<string>();
  #failures: InjectedFailure[] = [];
  #nextId = 1;
  #nextKey = 1;
  #clock: number;

  constructor(options: FakeServerOptions = {}) {
    this.tokens = new Set(options.tokens ?? []);
    this.#users = options.users ?? [];
    this.#clock = Date.parse(options.startTime ?? "2026-01-01T00:00:00.000Z");
  }

  /**
   * fetch implementation to hand to the client
   */
  readonly fetch: FetchLike = async (url, init) => {
    const req: RecordedRequest = {
      method: init.method ?? "GET",
      url: new URL(url),
      headers: new Headers(init.headers),
      body: init.body,
    };
    this.requests.push(req);

    const index = this.#failures.findIndex((failure) => failure.match(req));
    if (index !== -1) {
      const failure = this.#failures[index];
      if (failure) {
        if (failure.once ?? true) {
          this.#failures.splice(index, 1);
        }
        return this.#fail(failure, init.signal);
      }
    }

    return this.#route(req);
  };

  /**
   * Make matching requests fail
   */
  failWhen(failure: InjectedFailure): void {
    this.#failures.push(failure);
  }

  /**
   * Insert a snippet directly, bypassing the API
   */
  seed(snippet: Partial<Omit<StoredSnippet, "id">> & { title: string }): StoredSnippet {
    const now = this.#tick();
    const stored: StoredSnippet = {
      id: this.#nextId++,
      description: "",
      visibility: "private",
      categories: [],
      files: [{ filename: "snippet.txt", content: "" }],
      created_at: now,
      updated_at: now,
      ...snippet,
    };
    this.snippets.set(stored.id, stored);
    return stored;
  }

  /**
   * Requests whose path starts with `prefix`
   */
  requestsTo(prefix: string): RecordedRequest[] {
    return this.requests.filter((req) => req.url.pathname.startsWith(prefix));
  }

  #tick(): string {
    const value = new Date(this.#clock).toISOString();
    this.#clock += 1000;
    return value;
  }

  async #fail(failure: InjectedFailure, signal: RequestInit["signal"]): Promise<Response> {
    if (failure.hang) {
      return new Promise<Response>((_resolve, reject) => {
        signal?.addEventListener("abort", () => {
          const error = new Error("This operation was aborted");
          error.name = "AbortError";
          reject(error);
        });
      });
    }
    if (failure.networkError) {
      throw new TypeError("fetch failed");
    }
    return new Response(failure.body ?? "", {
      status: failure.status ?? 500,
      headers: failure.headers,
    });
  }

  async #route(req: RecordedRequest): Promise<Response> {
    const { pathname } = req.url;

    if (req.method === "POST" && pathname === "/auth/login") {
      return this.#login(req);
    }

    const token = /^Bearer (.+)$/.exec(req.headers.get("authorization") ?? "")?.[1];

    if (req.method === "POST" && pathname === "/keys") {
      if (!token || !this.#sessions.has(token)) {
        return json(401, { error: "Invalid session" });
      }
      const key = `test-key-${this.#nextKey++}`;
      this.tokens.add(key);
      return json(201, { key });
    }

    if (!token || !this.tokens.has(token)) {
      return json(401, { error: "Invalid API key" });
    }

    if (pathname === "/snippets" && req.method === "GET") {
      return this.#list(req.url);
    }
    if (pathname === "/snippets" && req.method === "POST") {
      return this.#write(req, undefined);
    }
    if (pathname === "/snippets/search" && req.method === "GET") {
      return this.#search(req.url);
    }

    const match = /^\/snippets\/(\d+)$/.exec(pathname);
    const id = match ? Number(match[1]) : NaN;
    const existing = this.snippets.get(id);
    if (!match) {
      return json(404, { error: "No such route" });
    }
    if (!existing) {
      return json(404, { error: `Snippet ${id} not found` });
    }

    switch (req.method) {
      case "GET":
        return json(200, existing);
      case "PUT":
        return this.#write(req, existing);
      case "DELETE":
        this.snippets.delete(id);
        return new Response(null, { status: 204 });
      default:
        return json(405, { error: "Method not allowed" });
    }
  }

  async #login(req: RecordedRequest): Promise<Response> {
    const body: unknown = typeof req.body === "string" ? JSON.parse(req.body) : null;
    const user = this.#users.find(
      (candidate) =>
        typeof body === "object" &&
        body !== null &&
        "username" in body &&
        "password" in body &&
        body.username === candidate.username &&
        body.password === candidate.password
    );
    if (!user) {
      return json(401, { error: "Invalid credentials" });
    }
    const session = `session-${user.username}`;
    this.#sessions.add(session);
    return json(200, { token: session, user: { username: user.username } });
  }

  #list(url: URL): Response {
    const page = Number(url.searchParams.get("page") ?? "1");
    const pageSize = Number(url.searchParams.get("page_size") ?? "10");
    const all = [...this.snippets.values()].sort((a, b) => a.id - b.id);
    const items = all.slice((page - 1) * pageSize, page * pageSize).map((snippet) => ({
      ...snippet,
      files: snippet.files.map(({ filename, language }) => ({ filename, language })),
    }));
    return json(200, { items, page, page_size: pageSize, total: all.length });
  }

  #search(url: URL): Response {
    const q = (url.searchParams.get("q") ?? "").toLowerCase();
    const searchCode = url.searchParams.get("search_code") === "true";
    const hits = [...this.snippets.values()].filter(
      (snippet) =>
        snippet.title.toLowerCase().includes(q) ||
        snippet.description.toLowerCase().includes(q) ||
        (searchCode && snippet.files.some((file) => file.content.toLowerCase().includes(q)))
    );
    // Highest id first; clients sort
    return json(200, hits.sort((a, b) => b.id - a.id));
  }

  async #write(req: RecordedRequest, existing: StoredSnippet | undefined): Promise<Response> {
    if (!(req.body instanceof FormData)) {
      return json(400, { error: "Expected multipart/form-data" });
    }
    const form = req.body;
    const title = form.get("title");
    const visibility = form.get("visibility");
    if (typeof title !== "string" || !title) {
      return json(400, { error: "title is required" });
    }
    if (visibility !== "public" && visibility !== "private") {
      return json(400, { error: "visibility must be public or private" });
    }

    const files: StoredFile[] = [];
    for (const entry of form.getAll("files[]")) {
      if (typeof entry === "string") {
        return json(400, { error: "files[] parts must be files" });
      }
      const ext = entry.name.split(".").pop() ?? "";
      const language = LANGUAGES[ext];
      files.push({ filename: entry.name, content: await entry.text(), ...(language ? { language } : {}) });
    }
    if (files.length === 0) {
      return json(400, { error: "at least one file is required" });
    }

    const description = form.get("description");
    const categories = form.getAll("categories[]").filter((c): c is string => typeof c === "string");
    const now = this.#tick();
    const stored: StoredSnippet = {
      id: existing?.id ?? this.#nextId++,
      title,
      description: typeof description === "string" ? description : "",
      visibility,
      categories,
      files,
      created_at: existing?.created_at ?? now,
      updated_at: now,
    };
    this.snippets.set(stored.id, stored);
    return json(existing ? 200 : 201, stored);
  }
}
