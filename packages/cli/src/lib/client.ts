/**
 * Client adapter for CLI
 * Wires the SDK client to the config directory and timeout from the environment
 */

import {
  CredentialVault,
  FileConfigStore,
  SnippetService,
  createSecretBackend,
  type ConfigStore,
  type FetchLike,
  type SecretBackend,
} from "@snipstash/sdk";
import { resolveCliConfigDir, resolveTimeoutMs } from "./env.js";

export interface CliClient {
  service: SnippetService;
  configStore: ConfigStore;
}

export interface OpenCliClientOptions {
  env?: NodeJS.ProcessEnv;
  secrets?: SecretBackend;
  fetch?: FetchLike;
}

/**
 * Open the snippet client and config store the CLI works with
 */
export function openCliClient(options: OpenCliClientOptions = {}): CliClient {
  const env = options.env ?? process.env;
  const dir = resolveCliConfigDir(env);
  const configStore = new FileConfigStore({ dir });
  const secrets = options.secrets ?? createSecretBackend(env.SNIPSTASH_CREDENTIAL_STORE, { dir });

  const service = new SnippetService({
    configStore,
    vault: new CredentialVault(secrets),
    fetch: options.fetch,
    timeoutMs: resolveTimeoutMs(env),
  });

  return { service, configStore };
}
