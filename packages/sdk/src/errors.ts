/**
 * Error types for SnipStash operations
 *
 * Invariants:
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - All errors support a `cause` property for wrapping underlying errors
 * - `remedy`, when present, is a single line telling the user what to do next
 * - No error message ever contains a credential value
 */

export interface SnipStashErrorOptions extends ErrorOptions {
  remedy?: string;
}

/**
 * Base class for all SnipStash errors
 */
export abstract class SnipStashError extends Error {
  abstract readonly code: string;
  readonly remedy?: string;

  constructor(message: string, options?: SnipStashErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.remedy = options?.remedy;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when the config file cannot be read, parsed or written
 */
export class ConfigError extends SnipStashError {
  readonly code = "CONFIG_ERROR";

  constructor(
    public readonly path: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Configuration error (${path}): ${reason}`, {
      ...options,
      remedy: `Fix or delete ${path} and run the command again`,
    });
  }
}

/**
 * Thrown when the secure storage backend fails
 */
export class CredentialError extends SnipStashError {
  readonly code: string = "CREDENTIAL_ERROR";

  constructor(message: string, options?: SnipStashErrorOptions) {
    super(message, {
      remedy:
        "Secure storage is unavailable; set SNIPSTASH_CREDENTIAL_STORE=file to keep the token in a private file instead",
      ...options,
    });
  }
}

/**
 * Thrown when no credential is stored for a server
 */
export class CredentialNotFoundError extends CredentialError {
  override readonly code = "CREDENTIAL_NOT_FOUND";

  constructor(public readonly serverUrl: string, options?: ErrorOptions) {
    super(`No credential stored for ${serverUrl}`, {
      ...options,
      remedy: `Run: snipstash login ${serverUrl}`,
    });
  }
}

/**
 * Thrown when an operation needs a session and there is none
 */
export class AuthRequiredError extends SnipStashError {
  readonly code = "AUTH_REQUIRED";

  constructor(message = "Not logged in", options?: ErrorOptions) {
    super(message, { ...options, remedy: "Run: snipstash login <server-url>" });
  }
}

export interface ValidationIssue {
  /** Dotted path of the offending field ("" for the whole input) */
  path: string;
  message: string;
}

/**
 * Thrown when input is rejected before anything is sent
 */
export class ValidationError extends SnipStashError {
  readonly code = "VALIDATION_ERROR";

  constructor(
    public readonly issues: ValidationIssue[],
    options?: ErrorOptions
  ) {
    super(
      `Invalid input: ${issues
        .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
        .join("; ")}`,
      options
    );
  }
}

export type ApiErrorKind =
  | "unauthorized"
  | "not_found"
  | "rate_limited"
  | "server_error"
  | "request_failed"
  | "network"
  | "invalid_response";

/**
 * Base class for failures of a request to the snippet service
 */
export abstract class ApiError extends SnipStashError {
  abstract readonly kind: ApiErrorKind;

  constructor(
    message: string,
    public readonly method: string,
    public readonly url: string,
    options?: SnipStashErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * HTTP 401: the token was rejected
 */
export class UnauthorizedError extends ApiError {
  readonly code = "UNAUTHORIZED";
  readonly kind = "unauthorized";

  constructor(method: string, url: string, message?: string, options?: ErrorOptions) {
    super(message ?? "The server rejected the API token (401 Unauthorized)", method, url, {
      ...options,
      remedy: "Run: snipstash login <server-url> to store a new token",
    });
  }
}

/**
 * HTTP 404
 */
export class NotFoundError extends ApiError {
  readonly code = "NOT_FOUND";
  readonly kind = "not_found";

  constructor(method: string, url: string, message?: string, options?: ErrorOptions) {
    super(message ?? `Not found: ${method} ${url}`, method, url, options);
  }
}

/**
 * HTTP 429; `retryAfter` is the server's Retry-After value, untouched
 */
export class RateLimitedError extends ApiError {
  readonly code = "RATE_LIMITED";
  readonly kind = "rate_limited";

  constructor(
    method: string,
    url: string,
    public readonly retryAfter?: string,
    options?: ErrorOptions
  ) {
    super("Rate limited by the server (429)", method, url, {
      ...options,
      remedy:
        retryAfter !== undefined
          ? `Retry after: ${retryAfter}`
          : "Wait a moment before retrying",
    });
  }
}

/**
 * HTTP 5xx
 */
export class ServerError extends ApiError {
  readonly code = "SERVER_ERROR";
  readonly kind = "server_error";

  constructor(
    method: string,
    url: string,
    public readonly status: number,
    public readonly body: string,
    message?: string,
    options?: ErrorOptions
  ) {
    super(message ?? `Server error (HTTP ${status})`, method, url, options);
  }
}

/**
 * Any other non-2xx status (400, 403, 409, ...)
 */
export class RequestFailedError extends ApiError {
  readonly code = "REQUEST_FAILED";
  readonly kind = "request_failed";

  constructor(
    method: string,
    url: string,
    public readonly status: number,
    public readonly body: string,
    message?: string,
    options?: ErrorOptions
  ) {
    super(message ?? `Request failed (HTTP ${status})`, method, url, options);
  }
}

/**
 * Transport failure: DNS, refused connection, TLS, dropped socket or timeout
 */
export class NetworkError extends ApiError {
  readonly code = "NETWORK_ERROR";
  readonly kind = "network";

  constructor(
    method: string,
    url: string,
    public readonly timedOut: boolean,
    options?: ErrorOptions
  ) {
    super(
      timedOut ? `Request timed out: ${method} ${url}` : `Could not reach the server: ${method} ${url}`,
      method,
      url,
      { ...options, remedy: "Check the server URL and your network connection" }
    );
  }
}

/**
 * The server answered 2xx with a body that is not what the API promises
 */
export class InvalidResponseError extends ApiError {
  readonly code = "INVALID_RESPONSE";
  readonly kind = "invalid_response";

  constructor(method: string, url: string, reason: string, options?: ErrorOptions) {
    super(`Unexpected response from ${method} ${url}: ${reason}`, method, url, options);
  }
}

/**
 * Thrown when fetching every page fails part-way. Pages fetched before the
 * failure are discarded; `lastFetchedPage` is 0 when the first page failed.
 */
export class PaginationError extends SnipStashError {
  readonly code = "PAGINATION_ERROR";

  constructor(
    public readonly lastFetchedPage: number,
    public readonly failedPage: number,
    cause: unknown
  ) {
    super(
      `Listing aborted at page ${failedPage} (last page fetched: ${lastFetchedPage}): ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      {
        cause,
        remedy:
          cause instanceof SnipStashError && cause.remedy
            ? cause.remedy
            : "Retry the listing; it restarts from page 1",
      }
    );
  }
}
