export type CredentialRecord = {
  accountId: string;
  accessToken: string;
  refreshToken: string | null;
  /** Absolute expiry, epoch milliseconds (UTC). */
  expiresAt: number;
  scopes: string[];
  tokenType: string;
  refreshInvalid?: boolean;
};

export type ServerMode = "single-user" | "multi-user";

export type ServiceName =
  | "gmail"
  | "drive"
  | "docs"
  | "sheets"
  | "script"
  | "chat";

export type OAuthClientCredentials = {
  clientId: string;
  clientSecret?: string;
};

export type ResolvedConfig = Readonly<{
  credentialsDir: string;
  mode: ServerMode;
  callbackPort: number;
  redirectUri: string;
  client: OAuthClientCredentials | null;
  services: readonly ServiceName[];
  scopes: readonly string[];
  readOnly: boolean;
  authTimeoutMs: number;
}>;

export type AuthStatus = {
  status: "ok" | "missing" | "expired" | "invalid" | "corrupt";
  reason?: string;
};

export type SessionBinding = Readonly<{
  accountId: string;
  boundAt: Date;
}>;
