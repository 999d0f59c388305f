import {
  AuthRequiredError,
  ConfigurationError,
  isWorkspaceAuthError,
  TokenRefreshError,
} from "../errors.js";
import {
  type CredentialStore,
  normalizeAccountId,
} from "../security/credential-store.js";
import type { CredentialRecord, ResolvedConfig } from "../types.js";
import { forAccount } from "../utils/log.js";
import {
  createOAuthClient,
  describeTokenFailure,
  type GoogleTransport,
  isInvalidGrant,
  refreshAccessToken,
  type TokenEndpointResult,
} from "./google.js";
import { missingScopes } from "./scopes.js";

export const DEFAULT_REFRESH_SKEW_MS = 60_000;

export type TokenRefresherDeps = {
  transport?: GoogleTransport;
  now?: () => number;
  skewMs?: number;
};

function reauthMessage(accountId: string, reason: string) {
  return `${reason} Re-authenticate ${accountId} with start_google_auth or \`workspace-mcp login\`.`;
}

/**
 * Hands out credentials whose access token is good for at least `skewMs`,
 * refreshing through the stored refresh token when it is not.
 */
export class TokenRefresher {
  private readonly config: ResolvedConfig;
  private readonly store: CredentialStore;
  private readonly transport: GoogleTransport;
  private readonly now: () => number;
  private readonly skewMs: number;
  // One load-check-refresh pass per account; later callers join it.
  private readonly inFlight = new Map<string, Promise<CredentialRecord>>();

  constructor(
    config: ResolvedConfig,
    store: CredentialStore,
    deps?: TokenRefresherDeps
  ) {
    this.config = config;
    this.store = store;
    this.transport = deps?.transport ?? {};
    this.now = deps?.now ?? Date.now;
    this.skewMs = deps?.skewMs ?? DEFAULT_REFRESH_SKEW_MS;
  }

  needsRefresh(record: CredentialRecord) {
    return this.now() + this.skewMs >= record.expiresAt;
  }

  async getValidCredential(
    accountId: string,
    requiredScopes: readonly string[] = []
  ): Promise<CredentialRecord> {
    const id = normalizeAccountId(accountId);
    const record = await this.currentRecord(id);
    const missing = missingScopes(record.scopes, requiredScopes);
    if (missing.length > 0) {
      throw new AuthRequiredError(
        reauthMessage(
          id,
          `The stored credential lacks scopes: ${missing.join(", ")}.`
        ),
        { accountId: id }
      );
    }
    return record;
  }

  private currentRecord(accountId: string) {
    const existing = this.inFlight.get(accountId);
    if (existing) {
      return existing;
    }
    const promise = this.loadFresh(accountId).finally(() => {
      this.inFlight.delete(accountId);
    });
    this.inFlight.set(accountId, promise);
    return promise;
  }

  private async loadFresh(accountId: string): Promise<CredentialRecord> {
    let record: CredentialRecord;
    try {
      record = await this.store.load(accountId);
    } catch (err) {
      if (isWorkspaceAuthError(err, "CredentialNotFound")) {
        throw new AuthRequiredError(
          reauthMessage(accountId, "No credential is stored."),
          { accountId, cause: err }
        );
      }
      throw err;
    }

    if (record.refreshInvalid) {
      throw new AuthRequiredError(
        reauthMessage(accountId, "Google rejected the stored refresh token."),
        { accountId }
      );
    }
    if (!this.needsRefresh(record)) {
      return record;
    }
    if (!record.refreshToken) {
      throw new AuthRequiredError(
        reauthMessage(
          accountId,
          "The access token expired and no refresh token is stored."
        ),
        { accountId }
      );
    }
    return this.refresh(record, record.refreshToken);
  }

  private async refresh(
    record: CredentialRecord,
    refreshToken: string
  ): Promise<CredentialRecord> {
    if (!this.config.client) {
      throw new ConfigurationError(
        "GOOGLE_OAUTH_CLIENT_ID is not set; stored credentials cannot be refreshed."
      );
    }
    const log = forAccount(record.accountId);
    log.debug("Refreshing access token.");

    let result: TokenEndpointResult;
    try {
      result = await refreshAccessToken(
        createOAuthClient(this.config, this.transport),
        refreshToken,
        this.now
      );
    } catch (err) {
      throw new TokenRefreshError(
        `Token refresh for ${record.accountId} failed: ${String(err)}`,
        { cause: err }
      );
    }

    if (!result.ok) {
      if (isInvalidGrant(result)) {
        await this.store.save(record.accountId, {
          ...record,
          refreshInvalid: true,
        });
        log.warn("Refresh token rejected (invalid_grant).");
        throw new AuthRequiredError(
          reauthMessage(
            record.accountId,
            "Google rejected the stored refresh token."
          ),
          { accountId: record.accountId }
        );
      }
      throw new TokenRefreshError(
        `Token refresh for ${record.accountId} failed: ${describeTokenFailure(result)}`,
        { status: result.status }
      );
    }

    const { tokens } = result;
    const updated: CredentialRecord = {
      ...record,
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken ?? refreshToken,
      expiresAt: tokens.expiresAt,
      scopes: tokens.scopes.length > 0 ? tokens.scopes : record.scopes,
      tokenType: tokens.tokenType,
    };
    const saved = await this.store.save(record.accountId, updated);
    const expires = new Date(saved.expiresAt).toISOString();
    log.debug(`Access token refreshed; expires ${expires}.`);
    return saved;
  }
}
