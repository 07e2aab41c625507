/**
 * Session state machine: unauthenticated ⇄ authenticated
 *
 * The initial state is derived on first use from the saved config and the
 * vault: authenticated iff a server URL is configured and a token is stored
 * for it. Transitions persist before they take effect in memory.
 */

import { AuthRequiredError, CredentialNotFoundError } from "./errors.js";
import type { CredentialVault } from "./credential-vault.js";
import { logger } from "./observability/logs.js";
import { normalizeServerUrl } from "./paths.js";
import type { AuthContext, ConfigStore, SessionStatus } from "./types.js";

type State =
  | { state: "unauthenticated"; serverUrl?: string }
  | { state: "authenticated"; auth: AuthContext };

export class Session {
  #configStore: ConfigStore;
  #vault: CredentialVault;
  #state: State | null = null;

  constructor(configStore: ConfigStore, vault: CredentialVault) {
    this.#configStore = configStore;
    this.#vault = vault;
  }

  async #current(): Promise<State> {
    if (this.#state === null) {
      this.#state = await this.#restore();
    }
    return this.#state;
  }

  async #restore(): Promise<State> {
    const config = await this.#configStore.load();
    if (!config.serverUrl) {
      return { state: "unauthenticated" };
    }
    try {
      const token = await this.#vault.retrieve(config.serverUrl);
      logger.debug("session.restored", { url: config.serverUrl });
      return { state: "authenticated", auth: { serverUrl: config.serverUrl, token } };
    } catch (err) {
      if (err instanceof CredentialNotFoundError) {
        return { state: "unauthenticated", serverUrl: config.serverUrl };
      }
      throw err;
    }
  }

  /**
   * Current state, without exposing the token
   */
  async status(): Promise<SessionStatus> {
    const current = await this.#current();
    if (current.state === "authenticated") {
      return { state: "authenticated", serverUrl: current.auth.serverUrl };
    }
    return current.serverUrl !== undefined
      ? { state: "unauthenticated", serverUrl: current.serverUrl }
      : { state: "unauthenticated" };
  }

  /**
   * Credentials for the next request. Performs no network I/O.
   * @throws {AuthRequiredError} When unauthenticated
   */
  async requireAuth(): Promise<AuthContext> {
    const current = await this.#current();
    if (current.state !== "authenticated") {
      throw new AuthRequiredError(
        current.serverUrl
          ? `Not logged in to ${current.serverUrl}`
          : "Not logged in: no server configured"
      );
    }
    return current.auth;
  }

  /**
   * Persist config and credential for a verified token, then become authenticated
   */
  async establish(serverUrl: string, token: string): Promise<void> {
    const normalized = normalizeServerUrl(serverUrl);
    const config = await this.#configStore.load();
    const previous = await this.#current();

    await this.#vault.store(normalized, token);
    await this.#configStore.save({ ...config, serverUrl: normalized });

    // One credential per configured server: drop the old server's entry
    if (previous.state === "authenticated" && previous.auth.serverUrl !== normalized) {
      await this.#vault.delete(previous.auth.serverUrl);
    }

    this.#state = { state: "authenticated", auth: { serverUrl: normalized, token } };
    logger.debug("session.login", { url: normalized });
  }

  /**
   * Delete the stored credential and become unauthenticated. The server URL stays configured.
   */
  async clear(): Promise<void> {
    const config = await this.#configStore.load();
    if (config.serverUrl) {
      await this.#vault.delete(config.serverUrl);
    }
    this.#state =
      config.serverUrl !== undefined
        ? { state: "unauthenticated", serverUrl: config.serverUrl }
        : { state: "unauthenticated" };
    logger.debug("session.logout", { url: config.serverUrl });
  }
}
