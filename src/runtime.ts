import { type ConfigOverrides, resolveConfig } from "./config/settings.js";
import {
  AccountBinder,
  type RequestIdentityResolver,
} from "./mcp/account-binder.js";
import type { ToolContext } from "./mcp/types.js";
import { OAuthFlowController } from "./oauth/flow.js";
import type { FetchLike, GoogleTransport } from "./oauth/google.js";
import { TokenRefresher } from "./oauth/refresher.js";
import { CredentialStore } from "./security/credential-store.js";
import type { ResolvedConfig } from "./types.js";

export type RuntimeOptions = {
  fetchFn?: FetchLike;
  now?: () => number;
  resolveIdentity?: RequestIdentityResolver;
  openBrowser?: (url: string) => Promise<unknown>;
};

/**
 * Builds every collaborator from one resolved configuration. Two runtimes
 * built from different configurations share no state.
 */
export function createRuntime(
  config: ResolvedConfig,
  options?: RuntimeOptions
): ToolContext {
  const transport: GoogleTransport = options?.fetchFn
    ? { fetchFn: options.fetchFn }
    : {};
  const store = new CredentialStore(config.credentialsDir);
  return {
    config,
    store,
    transport,
    binder: new AccountBinder(config, store, {
      resolveIdentity: options?.resolveIdentity,
    }),
    refresher: new TokenRefresher(config, store, {
      transport,
      now: options?.now,
    }),
    flow: new OAuthFlowController(config, store, {
      transport,
      now: options?.now,
      openBrowser: options?.openBrowser,
    }),
  };
}

export async function loadRuntime(
  env: Readonly<Record<string, string | undefined>> = process.env,
  overrides?: ConfigOverrides,
  options?: RuntimeOptions
) {
  const config = await resolveConfig(env, overrides);
  return createRuntime(config, options);
}
