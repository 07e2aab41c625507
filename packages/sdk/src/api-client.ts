/**
 * HTTP layer for the snippet service
 * Handles authentication headers, JSON and multipart bodies, timeouts,
 * response validation and error classification. Never retries.
 */

import type { z } from "zod";
import {
  InvalidResponseError,
  NetworkError,
  NotFoundError,
  RateLimitedError,
  RequestFailedError,
  ServerError,
  UnauthorizedError,
} from "./errors.js";
import { logger } from "./observability/logs.js";
import { SDK_VERSION } from "./version.js";
import type { AuthContext, FetchLike } from "./types.js";

export const DEFAULT_TIMEOUT_MS = 30_000;

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

/**
 * Supplies the server URL and token for each request. Throws AuthRequiredError
 * when there is no session; a missing token sends no Authorization header.
 */
export type CredentialSource = () => Promise<{ serverUrl: string; token?: string }>;

export type RequestBody = { json: unknown } | { form: FormData };

export interface ApiRequest {
  method: HttpMethod;
  /** Path below the server URL, starting with "/" */
  path: string;
  query?: Record<string, string | number | boolean | undefined>;
  body?: RequestBody;
}

export interface ApiClientOptions {
  credentials: CredentialSource;
  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike;
  /** Per-request deadline in milliseconds (default: 30s) */
  timeoutMs?: number;
}

interface RawResponse {
  status: number;
  headers: Headers;
  text: string;
}

const globalFetch: FetchLike = (url, init) => fetch(url, init);

const REDACTED = "**";

/**
 * Copy of the headers that is safe to log; secret values are replaced whole
 */
export function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const redacted: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    const lower = key.toLowerCase();
    if (lower === "authorization") {
      const parts = value.split(" ");
      redacted[key] = parts.length === 2 ? `${parts[0]} ${REDACTED}` : REDACTED;
    } else if (lower.includes("secret") || lower.includes("token") || lower.includes("key")) {
      redacted[key] = REDACTED;
    } else {
      redacted[key] = value;
    }
  }
  return redacted;
}

/**
 * Build the full request URL from a server URL, path and query parameters
 */
export function buildUrl(serverUrl: string, path: string, query?: ApiRequest["query"]): string {
  const base = serverUrl.replace(/\/+$/, "");
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value !== undefined) {
      params.append(key, String(value));
    }
  }
  const search = params.toString();
  return `${base}${path}${search ? `?${search}` : ""}`;
}

/**
 * Pull a human-readable message out of an error body ({"error": ...} or {"message": ...})
 */
function serverMessage(text: string): string | undefined {
  try {
    const body: unknown = JSON.parse(text);
    if (typeof body === "object" && body !== null) {
      if ("error" in body && typeof body.error === "string") return body.error;
      if ("message" in body && typeof body.message === "string") return body.message;
    }
  } catch {
    // Not JSON; fall through to the generic message
  }
  return undefined;
}

export class ApiClient {
  #credentials: CredentialSource;
  #fetch: FetchLike;
  #timeoutMs: number;

  constructor(options: ApiClientOptions) {
    this.#credentials = options.credentials;
    this.#fetch = options.fetch ?? globalFetch;
    this.#timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * A client that uses fixed credentials instead of the session (login probe)
   */
  withCredentials(auth: AuthContext): ApiClient {
    return this.#rebind(async () => auth);
  }

  /**
   * A client that sends no Authorization header (password login endpoints)
   */
  withoutCredentials(serverUrl: string): ApiClient {
    return this.#rebind(async () => ({ serverUrl }));
  }

  #rebind(credentials: CredentialSource): ApiClient {
    return new ApiClient({ credentials, fetch: this.#fetch, timeoutMs: this.#timeoutMs });
  }

  /**
   * Send a request and validate the JSON response body
   * @param schema - zod schema the body must satisfy; its output is returned
   * @throws {AuthRequiredError} Before sending, if there are no credentials
   * @throws {ApiError} On any failure
   */
  async request<S extends z.ZodTypeAny>(req: ApiRequest, schema: S): Promise<z.output<S>> {
    const { url, response } = await this.#send(req);

    if (response.status === 204 || response.text.length === 0) {
      throw new InvalidResponseError(req.method, url, "empty body");
    }

    let body: unknown;
    try {
      body = JSON.parse(response.text);
    } catch (err) {
      throw new InvalidResponseError(req.method, url, "body is not valid JSON", { cause: err });
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length ? ` at ${issue.path.join(".")}` : "";
      throw new InvalidResponseError(
        req.method,
        url,
        `body does not match the expected shape${where}: ${issue?.message ?? "invalid"}`,
        { cause: result.error }
      );
    }
    return result.data;
  }

  /**
   * Send a request whose success response carries no body of interest (DELETE)
   */
  async requestNoContent(req: ApiRequest): Promise<void> {
    await this.#send(req);
  }

  async #send(req: ApiRequest): Promise<{ url: string; response: RawResponse }> {
    const { serverUrl, token } = await this.#credentials();
    const url = buildUrl(serverUrl, req.path, req.query);

    const headers: Record<string, string> = {
      Accept: "application/json",
      "User-Agent": `snipstash/${SDK_VERSION}`,
    };
    if (token !== undefined) {
      headers["Authorization"] = `Bearer ${token}`;
    }

    let body: string | FormData | undefined;
    if (req.body && "json" in req.body) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(req.body.json);
    } else if (req.body) {
      // fetch sets the multipart Content-Type with its boundary
      body = req.body.form;
    }

    logger.debug("http.request", { method: req.method, url, details: redactHeaders(headers) });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.#timeoutMs);
    const start = Date.now();

    let response: RawResponse;
    try {
      const res = await this.#fetch(url, {
        method: req.method,
        headers,
        body,
        signal: controller.signal,
      });
      response = { status: res.status, headers: res.headers, text: await res.text() };
    } catch (err) {
      throw new NetworkError(req.method, url, controller.signal.aborted, { cause: err });
    } finally {
      clearTimeout(timeoutId);
    }

    logger.debug("http.response", {
      method: req.method,
      url,
      details: { status: response.status, duration_ms: Date.now() - start },
    });

    if (response.status >= 200 && response.status < 300) {
      return { url, response };
    }
    throw this.#classify(req.method, url, response);
  }

  #classify(method: string, url: string, response: RawResponse): Error {
    const { status, text } = response;
    const message = serverMessage(text);

    if (status === 401) {
      return new UnauthorizedError(method, url, message);
    }
    if (status === 404) {
      return new NotFoundError(method, url, message);
    }
    if (status === 429) {
      return new RateLimitedError(method, url, response.headers.get("retry-after") ?? undefined);
    }
    if (status >= 500) {
      return new ServerError(method, url, status, text, message);
    }
    return new RequestFailedError(method, url, status, text, message);
  }
}
