/**
 * Bearer token storage, one entry per server
 *
 * The token is handed to the backend and returned to the caller; it is never
 * logged, included in an error, or written next to the config.
 */

import { CredentialError, CredentialNotFoundError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { APP_NAME, normalizeServerUrl } from "./paths.js";
import type { SecretBackend } from "./types.js";

/** Service name under which every entry is stored */
export const VAULT_SERVICE = APP_NAME;

export class CredentialVault {
  #backend: SecretBackend;

  constructor(backend: SecretBackend) {
    this.#backend = backend;
  }

  /**
   * Store (or replace) the token for a server
   * @throws {CredentialError}
   */
  async store(serverUrl: string, secret: string): Promise<void> {
    const account = normalizeServerUrl(serverUrl);
    try {
      await this.#backend.setPassword(VAULT_SERVICE, account, secret);
    } catch (err) {
      throw new CredentialError(`Failed to store credential for ${account}`, { cause: err });
    }
    logger.debug("vault.store", { url: account });
  }

  /**
   * Retrieve the token for a server
   * @throws {CredentialNotFoundError} If nothing is stored
   * @throws {CredentialError} If the backend fails
   */
  async retrieve(serverUrl: string): Promise<string> {
    const account = normalizeServerUrl(serverUrl);
    let secret: string | null;
    try {
      secret = await this.#backend.getPassword(VAULT_SERVICE, account);
    } catch (err) {
      throw new CredentialError(`Failed to read credential for ${account}`, { cause: err });
    }
    if (secret === null) {
      throw new CredentialNotFoundError(account);
    }
    return secret;
  }

  /**
   * Delete the token for a server. Deleting an absent entry is not an error.
   * @returns true if an entry was removed
   * @throws {CredentialError}
   */
  async delete(serverUrl: string): Promise<boolean> {
    const account = normalizeServerUrl(serverUrl);
    try {
      const removed = await this.#backend.deletePassword(VAULT_SERVICE, account);
      logger.debug("vault.delete", { url: account, details: { removed } });
      return removed;
    } catch (err) {
      throw new CredentialError(`Failed to delete credential for ${account}`, { cause: err });
    }
  }
}
