export type WorkspaceAuthErrorCode =
  | "DirectoryUnwritable"
  | "CredentialNotFound"
  | "CredentialCorrupt"
  | "AuthTimeout"
  | "CsrfMismatch"
  | "TokenExchangeError"
  | "TokenRefreshError"
  | "AuthRequired"
  | "FlowInProgress"
  | "AmbiguousAccount"
  | "AccountMismatch"
  | "InvalidAccountId"
  | "Configuration";

/**
 * Base class for every failure raised by the credential subsystem.
 * Callers switch on `code` rather than on the concrete class.
 */
export class WorkspaceAuthError extends Error {
  readonly code: WorkspaceAuthErrorCode;

  constructor(
    code: WorkspaceAuthErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.code = code;
    this.name = `${code}Error`;
  }
}

export class DirectoryUnwritableError extends WorkspaceAuthError {
  readonly directory: string;

  constructor(directory: string, options?: { cause?: unknown }) {
    super(
      "DirectoryUnwritable",
      `Credentials directory ${directory} cannot be created or written.`,
      options
    );
    this.directory = directory;
  }
}

export class CredentialNotFoundError extends WorkspaceAuthError {
  readonly accountId: string;

  constructor(accountId: string) {
    super("CredentialNotFound", `No stored credential for ${accountId}.`);
    this.accountId = accountId;
  }
}

export class CredentialCorruptError extends WorkspaceAuthError {
  readonly accountId: string;
  readonly filePath: string;

  constructor(
    accountId: string,
    filePath: string,
    options?: { cause?: unknown }
  ) {
    super(
      "CredentialCorrupt",
      `Stored credential for ${accountId} at ${filePath} is unreadable. Remove it or re-authenticate.`,
      options
    );
    this.accountId = accountId;
    this.filePath = filePath;
  }
}

export class AuthTimeoutError extends WorkspaceAuthError {
  constructor(message = "Timed out waiting for the OAuth callback.") {
    super("AuthTimeout", message);
  }
}

// Cancellation shares the AuthTimeout code so callers handle both the same way.
export class AuthCancelledError extends AuthTimeoutError {
  constructor() {
    super("Authorization was cancelled before the OAuth callback arrived.");
  }
}

export class CsrfMismatchError extends WorkspaceAuthError {
  constructor() {
    super(
      "CsrfMismatch",
      "OAuth callback state does not match the issued state. The code was not exchanged."
    );
  }
}

export class TokenExchangeError extends WorkspaceAuthError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super("TokenExchangeError", message, options);
    this.status = options?.status;
  }
}

export class TokenRefreshError extends WorkspaceAuthError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super("TokenRefreshError", message, options);
    this.status = options?.status;
  }
}

export class AuthRequiredError extends WorkspaceAuthError {
  readonly accountId?: string;

  constructor(
    message: string,
    options?: { accountId?: string; cause?: unknown }
  ) {
    super("AuthRequired", message, options);
    this.accountId = options?.accountId;
  }
}

export class FlowInProgressError extends WorkspaceAuthError {
  constructor() {
    super(
      "FlowInProgress",
      "An authorization flow is already in progress. Finish or cancel it first."
    );
  }
}

export class AmbiguousAccountError extends WorkspaceAuthError {
  readonly candidates: string[];

  constructor(directory: string, candidates: string[]) {
    super(
      "AmbiguousAccount",
      `Single-user mode found ${candidates.length} accounts in ${directory} (${candidates.join(", ")}). Remove all but one or point WORKSPACE_MCP_CREDENTIALS_DIR at a dedicated directory.`
    );
    this.candidates = candidates;
  }
}

/** Single-user sign-in completed for an account other than the stored one. */
export class AccountMismatchError extends WorkspaceAuthError {
  readonly accountId: string;
  readonly stored: string[];

  constructor(accountId: string, stored: string[]) {
    super(
      "AccountMismatch",
      `Signed in as ${accountId}, but this single-user credentials directory already holds ${stored.join(", ")}. Run \`workspace-mcp remove\` for the old account first, or use a separate credentials directory.`
    );
    this.accountId = accountId;
    this.stored = stored;
  }
}

export class InvalidAccountIdError extends WorkspaceAuthError {
  constructor(value: string) {
    super("InvalidAccountId", `"${value}" is not a valid account email.`);
  }
}

export class ConfigurationError extends WorkspaceAuthError {
  constructor(message: string) {
    super("Configuration", message);
  }
}

export function isWorkspaceAuthError(
  err: unknown,
  code?: WorkspaceAuthErrorCode
): err is WorkspaceAuthError {
  if (!(err instanceof WorkspaceAuthError)) {
    return false;
  }
  return code === undefined || err.code === code;
}

/** Errors that can only be cleared by re-running the authorization flow. */
export function requiresReauthentication(err: unknown) {
  return (
    isWorkspaceAuthError(err, "AuthRequired") ||
    isWorkspaceAuthError(err, "CredentialNotFound") ||
    isWorkspaceAuthError(err, "CredentialCorrupt")
  );
}
