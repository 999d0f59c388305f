import type { OAuth2Client } from "google-auth-library";
import open from "open";
import {
  AccountMismatchError,
  AuthCancelledError,
  AuthTimeoutError,
  ConfigurationError,
  CsrfMismatchError,
  FlowInProgressError,
  isWorkspaceAuthError,
  TokenExchangeError,
} from "../errors.js";
import {
  type CredentialStore,
  normalizeAccountId,
} from "../security/credential-store.js";
import type { CredentialRecord, ResolvedConfig } from "../types.js";
import { debug, forAccount, info, warn } from "../utils/log.js";
import {
  type CallbackListener,
  type CallbackRequest,
  startCallbackServer,
} from "./callback-server.js";
import {
  buildAuthorizationUrl,
  createOAuthClient,
  createPkcePair,
  createStateToken,
  describeTokenFailure,
  exchangeAuthorizationCode,
  fetchUserInfo,
  type GoogleTransport,
  type TokenEndpointResult,
} from "./google.js";

export type FlowState =
  | "idle"
  | "init"
  | "awaiting-callback"
  | "callback-received"
  | "exchanging"
  | "stored"
  | "failed";

const TERMINAL_STATES: readonly FlowState[] = ["idle", "stored", "failed"];

export type AuthorizationAttempt = {
  authorizationUrl: string;
  redirectUri: string;
  /** Settles only after the callback listener has been released. */
  result: Promise<CredentialRecord>;
  cancel(): Promise<void>;
};

export type StartFlowOptions = {
  loginHint?: string;
  signal?: AbortSignal;
  /** Bounds the wait for the callback; the exchange has its own limit. */
  timeoutMs?: number;
};

export type OAuthFlowDeps = {
  transport?: GoogleTransport;
  now?: () => number;
  openBrowser?: (url: string) => Promise<unknown>;
};

type Pending = {
  expectedState: string;
  codeVerifier: string;
  oauth: OAuth2Client;
  exchangeAbort: AbortController;
};

/**
 * Drives one authorization-code exchange at a time:
 * idle → init → awaiting-callback → callback-received → exchanging →
 * stored | failed.
 */
export class OAuthFlowController {
  private readonly config: ResolvedConfig;
  private readonly store: CredentialStore;
  private readonly transport: GoogleTransport;
  private readonly now: () => number;
  private readonly openBrowser: (url: string) => Promise<unknown>;
  private stateValue: FlowState = "idle";
  private failureValue: Error | null = null;
  private activeCancel: (() => Promise<void>) | null = null;

  constructor(
    config: ResolvedConfig,
    store: CredentialStore,
    deps?: OAuthFlowDeps
  ) {
    this.config = config;
    this.store = store;
    this.transport = deps?.transport ?? {};
    this.now = deps?.now ?? Date.now;
    this.openBrowser = deps?.openBrowser ?? ((url) => open(url));
  }

  get state() {
    return this.stateValue;
  }

  get failure() {
    return this.failureValue;
  }

  get isActive() {
    return !TERMINAL_STATES.includes(this.stateValue);
  }

  private transition(next: FlowState) {
    debug(`OAuth flow: ${this.stateValue} -> ${next}`);
    this.stateValue = next;
  }

  private fail(err: unknown) {
    this.failureValue = err instanceof Error ? err : new Error(String(err));
    this.activeCancel = null;
    this.transition("failed");
  }

  async start(options?: StartFlowOptions): Promise<AuthorizationAttempt> {
    if (this.isActive) {
      throw new FlowInProgressError();
    }
    if (!this.config.client) {
      throw new ConfigurationError(
        "GOOGLE_OAUTH_CLIENT_ID is not set. Configure an OAuth client before signing in."
      );
    }
    this.failureValue = null;
    this.transition("init");

    const exchangeAbort = new AbortController();
    const oauth = createOAuthClient(this.config, {
      ...this.transport,
      signal: exchangeAbort.signal,
    });
    const expectedState = createStateToken();
    let authorizationUrl: string;
    let listener: CallbackListener;
    let codeVerifier: string;
    try {
      const pkce = await createPkcePair(oauth);
      codeVerifier = pkce.verifier;
      authorizationUrl = buildAuthorizationUrl(oauth, {
        scopes: this.config.scopes,
        state: expectedState,
        codeChallenge: pkce.challenge,
        loginHint: options?.loginHint,
      });
      listener = await startCallbackServer(this.config.redirectUri);
    } catch (err) {
      this.fail(err);
      throw err;
    }
    this.transition("awaiting-callback");

    const pending: Pending = {
      expectedState,
      codeVerifier,
      oauth,
      exchangeAbort,
    };
    let waiting = true;
    let finished = false;
    let abortWait: (err: Error) => void = () => undefined;
    const aborted = new Promise<never>((_, reject) => {
      abortWait = reject;
    });
    const stop = (err: Error) => {
      if (finished) {
        return;
      }
      if (waiting) {
        abortWait(err);
      }
      exchangeAbort.abort(err);
    };

    const timeoutMs = options?.timeoutMs ?? this.config.authTimeoutMs;
    const timer = setTimeout(() => stop(new AuthTimeoutError()), timeoutMs);
    timer.unref?.();
    const onAbort = () => stop(new AuthCancelledError());
    if (options?.signal?.aborted) {
      onAbort();
    }
    options?.signal?.addEventListener("abort", onAbort, { once: true });

    const run = async () => {
      try {
        let request: CallbackRequest;
        try {
          request = await Promise.race([listener.callback, aborted]);
        } finally {
          waiting = false;
          clearTimeout(timer);
        }
        this.transition("callback-received");
        return await this.handleCallback(request, pending);
      } finally {
        finished = true;
        clearTimeout(timer);
        options?.signal?.removeEventListener("abort", onAbort);
        await listener.close();
      }
    };

    const result = run().then(
      (record) => {
        this.activeCancel = null;
        this.transition("stored");
        return record;
      },
      (err: unknown) => {
        this.fail(err);
        throw err;
      }
    );
    result.catch((err: unknown) => {
      debug(`OAuth flow ended without credentials: ${String(err)}`);
    });

    const cancel = async () => {
      stop(new AuthCancelledError());
      await listener.close();
      await result.then(
        () => undefined,
        () => undefined
      );
    };
    this.activeCancel = cancel;

    return {
      authorizationUrl,
      redirectUri: listener.redirectUri,
      result,
      cancel,
    };
  }

  /** Cancels the in-flight attempt and waits for its listener to close. */
  async cancelActive() {
    const cancel = this.activeCancel;
    if (cancel) {
      await cancel();
    }
  }

  private async handleCallback(request: CallbackRequest, pending: Pending) {
    try {
      const record = await this.exchange(request, pending);
      await request.reply({
        ok: true,
        message: `Signed in as ${record.accountId}. You can close this window and return to your assistant.`,
      });
      return record;
    } catch (err) {
      await request.reply({ ok: false, message: callbackFailureMessage(err) });
      throw err;
    }
  }

  private async exchange(request: CallbackRequest, pending: Pending) {
    if (request.state !== pending.expectedState) {
      throw new CsrfMismatchError();
    }
    if (request.error) {
      const detail = request.errorDescription
        ? ` (${request.errorDescription})`
        : "";
      throw new TokenExchangeError(
        `Authorization was not granted: ${request.error}${detail}`
      );
    }
    if (!request.code) {
      throw new TokenExchangeError(
        "OAuth callback did not include an authorization code."
      );
    }
    this.transition("exchanging");

    const signal = pending.exchangeAbort.signal;
    const rethrowIfAborted = () => {
      if (signal.aborted) {
        throw signal.reason instanceof Error
          ? signal.reason
          : new AuthCancelledError();
      }
    };

    let result: TokenEndpointResult;
    try {
      result = await exchangeAuthorizationCode(
        pending.oauth,
        {
          code: request.code,
          codeVerifier: pending.codeVerifier,
          redirectUri: this.config.redirectUri,
        },
        this.now
      );
    } catch (err) {
      rethrowIfAborted();
      throw new TokenExchangeError(
        `Token exchange request failed: ${String(err)}`,
        { cause: err }
      );
    }
    if (!result.ok) {
      throw new TokenExchangeError(
        `Token exchange failed: ${describeTokenFailure(result)}`,
        { status: result.status }
      );
    }

    let email: string;
    try {
      const { accessToken } = result.tokens;
      email = (await fetchUserInfo(pending.oauth, accessToken)).email;
    } catch (err) {
      rethrowIfAborted();
      throw new TokenExchangeError(
        `Could not determine the signed-in account: ${String(err)}`,
        { cause: err }
      );
    }
    const accountId = normalizeAccountId(email);
    await this.assertAccountAllowed(accountId);
    const refreshToken =
      result.tokens.refreshToken ??
      (await this.previousRefreshToken(accountId));
    if (!refreshToken) {
      forAccount(accountId).warn(
        "Google returned no refresh token; the credential will need re-authentication when it expires."
      );
    }
    rethrowIfAborted();
    const record: CredentialRecord = {
      accountId,
      accessToken: result.tokens.accessToken,
      refreshToken,
      expiresAt: result.tokens.expiresAt,
      scopes:
        result.tokens.scopes.length > 0
          ? result.tokens.scopes
          : [...this.config.scopes],
      tokenType: result.tokens.tokenType,
    };
    return this.store.save(accountId, record);
  }

  // A single-user directory holds one account; a second would make the next
  // startup ambiguous.
  private async assertAccountAllowed(accountId: string) {
    if (this.config.mode !== "single-user") {
      return;
    }
    const others = (await this.store.list()).filter((id) => id !== accountId);
    if (others.length > 0) {
      throw new AccountMismatchError(accountId, others);
    }
  }

  private async previousRefreshToken(accountId: string) {
    try {
      const existing = await this.store.find(accountId);
      if (existing && !existing.refreshInvalid) {
        return existing.refreshToken;
      }
      return null;
    } catch (err) {
      if (isWorkspaceAuthError(err, "CredentialCorrupt")) {
        return null;
      }
      throw err;
    }
  }

  /** Runs a flow end to end, opening the browser on the authorization URL. */
  async authorize(options?: StartFlowOptions & { launchBrowser?: boolean }) {
    const attempt = await this.start(options);
    info("Open the following URL in your browser to authorize:");
    info(attempt.authorizationUrl);
    if (options?.launchBrowser ?? true) {
      try {
        await this.openBrowser(attempt.authorizationUrl);
      } catch (err) {
        warn(`Failed to open browser automatically: ${String(err)}`);
      }
    }
    return attempt.result;
  }
}

export type SignalSource = {
  once(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
};

/**
 * Cancels the active attempt on SIGINT or SIGTERM. Returns a function that
 * removes the handlers.
 */
export function cancelOnSignals(
  flow: OAuthFlowController,
  source: SignalSource = process
) {
  const signals = ["SIGINT", "SIGTERM"] as const;
  const cancel = () => {
    flow.cancelActive().catch((err: unknown) => {
      warn(`Failed to cancel sign-in: ${String(err)}`);
    });
  };
  for (const signal of signals) {
    source.once(signal, cancel);
  }
  return () => {
    for (const signal of signals) {
      source.off(signal, cancel);
    }
  };
}

function callbackFailureMessage(err: unknown) {
  if (isWorkspaceAuthError(err, "CsrfMismatch")) {
    return "The authorization response did not match this sign-in attempt. Start the sign-in again.";
  }
  if (err instanceof AccountMismatchError) {
    return err.message;
  }
  return "Google sign-in could not be completed. Check the server log and try again.";
}
