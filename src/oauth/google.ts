import { randomBytes } from "node:crypto";
import {
  CodeChallengeMethod,
  type Credentials,
  OAuth2Client,
} from "google-auth-library";
import { z } from "zod";
import type { ResolvedConfig } from "../types.js";
import { parseScopeString } from "./scopes.js";

export const GOOGLE_AUTH_URL = "https://accounts.google.com/o/oauth2/v2/auth";
export const GOOGLE_TOKEN_URL = "https://oauth2.googleapis.com/token";
export const GOOGLE_USERINFO_URL =
  "https://www.googleapis.com/oauth2/v2/userinfo";

export const TOKEN_REQUEST_TIMEOUT_MS = 30_000;

// Google omits expires_in only for non-expiring grants, which it does not
// issue to installed apps; assume its standard lifetime.
const DEFAULT_EXPIRES_IN_MS = 3_600_000;

export type FetchLike = typeof fetch;

/** How the OAuth client reaches Google. Tests swap in their own fetch. */
export type GoogleTransport = {
  fetchFn?: FetchLike;
  timeoutMs?: number;
  signal?: AbortSignal;
};

const credentialsSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).nullish(),
  expiry_date: z.number().nullish(),
  scope: z.string().nullish(),
  token_type: z.string().nullish(),
});

// The shape of the error the client throws for a non-2xx response.
const httpFailureSchema = z.object({
  response: z.object({
    status: z.number(),
    data: z.unknown(),
  }),
});

const errorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

const userInfoSchema = z.object({
  email: z.string().min(1),
  verified_email: z.boolean().optional(),
  name: z.string().optional(),
  picture: z.string().optional(),
});

export type GoogleTokens = {
  accessToken: string;
  refreshToken?: string;
  expiresAt: number;
  scopes: string[];
  tokenType: string;
};

export type GoogleUserInfo = z.infer<typeof userInfoSchema>;

export type TokenFailure = {
  ok: false;
  status: number;
  error: string;
  description?: string;
};

export type TokenEndpointResult =
  | { ok: true; tokens: GoogleTokens }
  | TokenFailure;

export function createOAuthClient(
  config: Pick<ResolvedConfig, "client" | "redirectUri">,
  transport?: GoogleTransport
) {
  return new OAuth2Client({
    clientId: config.client?.clientId,
    clientSecret: config.client?.clientSecret,
    redirectUri: config.redirectUri,
    transporterOptions: {
      timeout: transport?.timeoutMs ?? TOKEN_REQUEST_TIMEOUT_MS,
      ...(transport?.fetchFn
        ? { fetchImplementation: transport.fetchFn }
        : {}),
      ...(transport?.signal ? { signal: transport.signal } : {}),
    },
  });
}

export function createStateToken() {
  return randomBytes(24).toString("base64url");
}

export async function createPkcePair(oauth: OAuth2Client) {
  const { codeVerifier, codeChallenge } =
    await oauth.generateCodeVerifierAsync();
  if (!codeChallenge) {
    throw new Error("OAuth client did not produce a PKCE code challenge.");
  }
  return { verifier: codeVerifier, challenge: codeChallenge };
}

export function buildAuthorizationUrl(
  oauth: OAuth2Client,
  options: {
    scopes: readonly string[];
    state: string;
    codeChallenge: string;
    loginHint?: string;
  }
) {
  return oauth.generateAuthUrl({
    access_type: "offline",
    prompt: "consent",
    include_granted_scopes: true,
    scope: [...options.scopes],
    state: options.state,
    code_challenge: options.codeChallenge,
    code_challenge_method: CodeChallengeMethod.S256,
    ...(options.loginHint ? { login_hint: options.loginHint } : {}),
  });
}

function toResult(
  credentials: Credentials,
  now: () => number
): TokenEndpointResult {
  const parsed = credentialsSchema.safeParse(credentials);
  if (!parsed.success) {
    return {
      ok: false,
      status: 200,
      error: "invalid_token_response",
      description: "Token endpoint returned an unexpected payload.",
    };
  }
  const raw = parsed.data;
  return {
    ok: true,
    tokens: {
      accessToken: raw.access_token,
      refreshToken: raw.refresh_token ?? undefined,
      expiresAt: raw.expiry_date ?? now() + DEFAULT_EXPIRES_IN_MS,
      scopes: parseScopeString(raw.scope ?? undefined),
      tokenType: raw.token_type ?? "Bearer",
    },
  };
}

/** A failure Google answered with, or null when the request never got one. */
function toTokenFailure(err: unknown): TokenFailure | null {
  const parsed = httpFailureSchema.safeParse(err);
  if (!parsed.success) {
    return null;
  }
  const { status, data } = parsed.data.response;
  const body = errorResponseSchema.safeParse(data);
  return {
    ok: false,
    status,
    error: body.success ? body.data.error : `http_${status}`,
    description: body.success ? body.data.error_description : undefined,
  };
}

/**
 * Trades an authorization code for tokens. Failures Google reports come
 * back as `{ ok: false }`; transport failures reject.
 */
export async function exchangeAuthorizationCode(
  oauth: OAuth2Client,
  options: { code: string; codeVerifier: string; redirectUri: string },
  now: () => number = Date.now
): Promise<TokenEndpointResult> {
  try {
    const { tokens } = await oauth.getToken({
      code: options.code,
      codeVerifier: options.codeVerifier,
      redirect_uri: options.redirectUri,
    });
    return toResult(tokens, now);
  } catch (err) {
    const failure = toTokenFailure(err);
    if (failure) {
      return failure;
    }
    throw err;
  }
}

/**
 * Runs the refresh-token grant. `oauth` should be a client used for nothing
 * else, since its credentials are replaced.
 */
export async function refreshAccessToken(
  oauth: OAuth2Client,
  refreshToken: string,
  now: () => number = Date.now
): Promise<TokenEndpointResult> {
  // The client writes the old refresh token back over its credentials, so a
  // rotated one is only visible on the raw `tokens` event.
  let rotated: string | undefined;
  const onTokens = (tokens: Credentials) => {
    rotated = tokens.refresh_token ?? undefined;
  };
  oauth.on("tokens", onTokens);
  oauth.setCredentials({ refresh_token: refreshToken });
  try {
    await oauth.getAccessToken();
    return toResult(
      { ...oauth.credentials, refresh_token: rotated ?? null },
      now
    );
  } catch (err) {
    const failure = toTokenFailure(err);
    if (failure) {
      return failure;
    }
    throw err;
  } finally {
    oauth.off("tokens", onTokens);
  }
}

export function isInvalidGrant(result: TokenEndpointResult) {
  return !result.ok && result.error === "invalid_grant";
}

export function describeTokenFailure(result: TokenFailure) {
  const detail = result.description ? `: ${result.description}` : "";
  return `${result.error} (HTTP ${result.status})${detail}`;
}

export async function fetchUserInfo(
  oauth: OAuth2Client,
  accessToken: string
): Promise<GoogleUserInfo> {
  oauth.setCredentials({ access_token: accessToken });
  let data: unknown;
  try {
    data = (await oauth.request<unknown>({ url: GOOGLE_USERINFO_URL })).data;
  } catch (err) {
    const failure = toTokenFailure(err);
    if (failure) {
      throw new Error(
        `Userinfo request failed with HTTP ${failure.status}.`,
        { cause: err }
      );
    }
    throw err;
  }
  const parsed = userInfoSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error("Userinfo response did not include an email address.");
  }
  return parsed.data;
}
