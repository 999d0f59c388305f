import {
  AmbiguousAccountError,
  AuthRequiredError,
  ConfigurationError,
} from "../errors.js";
import {
  type CredentialStore,
  normalizeAccountId,
} from "../security/credential-store.js";
import type { ResolvedConfig, SessionBinding } from "../types.js";
import { info } from "../utils/log.js";

/**
 * Extension point for multi-user mode: maps the identity of an inbound
 * request to the account whose credentials serve it. No rule ships built in.
 */
export type RequestIdentityResolver = (
  requestIdentity: string
) => Promise<string | null> | string | null;

export class AccountBinder {
  private readonly config: ResolvedConfig;
  private readonly store: CredentialStore;
  private readonly resolveIdentity: RequestIdentityResolver | null;
  private binding: SessionBinding | null = null;

  constructor(
    config: ResolvedConfig,
    store: CredentialStore,
    options?: { resolveIdentity?: RequestIdentityResolver }
  ) {
    this.config = config;
    this.store = store;
    this.resolveIdentity = options?.resolveIdentity ?? null;
  }

  private requireResolver() {
    if (!this.resolveIdentity) {
      throw new ConfigurationError(
        "Multi-user mode needs a request identity resolver. Set MCP_SINGLE_USER_MODE=1 to run single-user."
      );
    }
    return this.resolveIdentity;
  }

  get mode() {
    return this.config.mode;
  }

  get current() {
    return this.binding;
  }

  /**
   * Single-user startup binding: no record leaves the process unbound, one
   * record binds it, several are a configuration error. Multi-user mode
   * binds nothing here but must have a resolver.
   */
  async bind(): Promise<SessionBinding | null> {
    if (this.config.mode !== "single-user") {
      this.requireResolver();
      return null;
    }
    const accounts = await this.store.list();
    if (accounts.length > 1) {
      throw new AmbiguousAccountError(this.store.directory, accounts);
    }
    const [accountId] = accounts;
    if (!accountId) {
      info(
        `No stored credentials in ${this.store.directory}. Authorization is required.`
      );
      this.binding = null;
      return null;
    }
    this.binding = Object.freeze({ accountId, boundAt: new Date() });
    info(`Bound to ${accountId}.`);
    return this.binding;
  }

  /** Replaces the binding after a completed authorization. */
  rebind(accountId: string): SessionBinding {
    const id = normalizeAccountId(accountId);
    const previous = this.binding?.accountId;
    this.binding = Object.freeze({ accountId: id, boundAt: new Date() });
    if (previous && previous !== id) {
      info(`Re-bound from ${previous} to ${id}.`);
    }
    return this.binding;
  }

  release() {
    this.binding = null;
  }

  /** The account serving a call; raises AuthRequired when none is bound. */
  async accountFor(requestIdentity?: string): Promise<string> {
    if (this.config.mode === "multi-user") {
      const resolveIdentity = this.requireResolver();
      if (!requestIdentity) {
        throw new AuthRequiredError(
          "The request carries no identity to map to an account."
        );
      }
      const accountId = await resolveIdentity(requestIdentity);
      if (!accountId) {
        throw new AuthRequiredError(
          `No account is mapped to ${requestIdentity}.`
        );
      }
      return normalizeAccountId(accountId);
    }
    if (!this.binding) {
      throw new AuthRequiredError(
        "No Google account is signed in. Run start_google_auth (or `workspace-mcp login`) first."
      );
    }
    return this.binding.accountId;
  }
}
