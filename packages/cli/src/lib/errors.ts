/**
 * CLI error handling and exit code mapping
 */

import {
  AuthRequiredError,
  CredentialNotFoundError,
  NotFoundError,
  PaginationError,
  RateLimitedError,
  SnipStashError,
  UnauthorizedError,
} from "@snipstash/sdk";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_NOT_FOUND = 2;
export const EXIT_AUTH = 3;
export const EXIT_RATE_LIMITED = 4;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_FAILURE;
  }
}

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/network/unknown error
 * - 2: snippet not found
 * - 3: not logged in or token rejected
 * - 4: rate limited
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  // A failed listing exits like the request that broke it
  if (error instanceof PaginationError) {
    return mapSdkErrorToExitCode(error.cause);
  }

  if (error instanceof NotFoundError) {
    return EXIT_NOT_FOUND;
  }

  if (
    error instanceof AuthRequiredError ||
    error instanceof UnauthorizedError ||
    error instanceof CredentialNotFoundError
  ) {
    return EXIT_AUTH;
  }

  if (error instanceof RateLimitedError) {
    return EXIT_RATE_LIMITED;
  }

  return EXIT_FAILURE;
}

/**
 * Format an error for CLI output. The remedy, when there is one, goes on its own line.
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Server bodies can be large
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (error instanceof SnipStashError && error.remedy) {
      message += `\n${error.remedy}`;
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
