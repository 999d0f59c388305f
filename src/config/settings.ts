import { ConfigurationError } from "../errors.js";
import { getScopesForServices, isServiceName } from "../oauth/scopes.js";
import type {
  OAuthClientCredentials,
  ResolvedConfig,
  ServerMode,
  ServiceName,
} from "../types.js";
import { prepareCredentialsDir, resolveCredentialsDir } from "./paths.js";

export const DEFAULT_CALLBACK_PORT = 8000;
export const DEFAULT_BASE_URI = "http://localhost";
export const DEFAULT_AUTH_TIMEOUT_MS = 5 * 60 * 1000;
export const DEFAULT_SERVICES: readonly ServiceName[] = [
  "gmail",
  "docs",
  "script",
];
export const CALLBACK_PATH = "/oauth2callback";

type Env = Readonly<Record<string, string | undefined>>;

export type ConfigOverrides = {
  callbackPort?: number;
  services?: string;
  readOnly?: boolean;
  clientId?: string;
  clientSecret?: string;
};

function isTruthy(value: string | undefined) {
  return value === "1" || value?.toLowerCase() === "true";
}

function isFalsy(value: string | undefined) {
  return value === "0" || value?.toLowerCase() === "false";
}

function parsePositiveInteger(
  name: string,
  raw: string | undefined,
  fallback: number
) {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(
      `${name} must be a positive integer, got "${raw}".`
    );
  }
  return parsed;
}

function parsePort(name: string, raw: string | number | undefined) {
  const port =
    typeof raw === "number"
      ? raw
      : parsePositiveInteger(name, raw, DEFAULT_CALLBACK_PORT);
  if (!Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new ConfigurationError(
      `${name} must be a port between 1 and 65535, got ${port}.`
    );
  }
  return port;
}

export function parseServices(raw: string | undefined): ServiceName[] {
  if (!raw || raw.trim() === "") {
    return [...DEFAULT_SERVICES];
  }
  const services: ServiceName[] = [];
  for (const item of raw.split(/[ ,]+/)) {
    const name = item.trim().toLowerCase();
    if (!name) {
      continue;
    }
    if (!isServiceName(name)) {
      throw new ConfigurationError(`Unknown service "${item}".`);
    }
    if (!services.includes(name)) {
      services.push(name);
    }
  }
  return services;
}

export function resolveMode(env: Env): ServerMode {
  return isFalsy(env.MCP_SINGLE_USER_MODE) ? "multi-user" : "single-user";
}

export function getClientCredentialsFromEnv(
  env: Env,
  overrides?: ConfigOverrides
): OAuthClientCredentials | null {
  const clientId = overrides?.clientId || env.GOOGLE_OAUTH_CLIENT_ID;
  const clientSecret =
    overrides?.clientSecret || env.GOOGLE_OAUTH_CLIENT_SECRET;
  if (!clientId) {
    return null;
  }
  return clientSecret ? { clientId, clientSecret } : { clientId };
}

export function buildRedirectUri(baseUri: string, port: number) {
  const url = new URL(baseUri);
  url.port = String(port);
  url.pathname = CALLBACK_PATH;
  url.search = "";
  return url.toString();
}

/**
 * Everything the configuration layer can decide without touching the disk.
 */
export function buildConfig(
  env: Env = process.env,
  overrides?: ConfigOverrides
): ResolvedConfig {
  const callbackPort = parsePort(
    "WORKSPACE_MCP_PORT",
    overrides?.callbackPort ?? env.WORKSPACE_MCP_PORT
  );
  const baseUri = env.WORKSPACE_MCP_BASE_URI?.trim() || DEFAULT_BASE_URI;
  let redirectUri: string;
  try {
    redirectUri = buildRedirectUri(baseUri, callbackPort);
  } catch {
    throw new ConfigurationError(
      `WORKSPACE_MCP_BASE_URI is not a URL: "${baseUri}".`
    );
  }
  const services = parseServices(
    overrides?.services ?? env.WORKSPACE_MCP_TOOLS
  );
  const readOnly = overrides?.readOnly ?? isTruthy(env.WORKSPACE_MCP_READ_ONLY);
  return Object.freeze({
    credentialsDir: resolveCredentialsDir(env),
    mode: resolveMode(env),
    callbackPort,
    redirectUri,
    client: getClientCredentialsFromEnv(env, overrides),
    services: Object.freeze(services),
    scopes: Object.freeze(getScopesForServices(services, { readOnly })),
    readOnly,
    authTimeoutMs: parsePositiveInteger(
      "WORKSPACE_MCP_AUTH_TIMEOUT_MS",
      env.WORKSPACE_MCP_AUTH_TIMEOUT_MS,
      DEFAULT_AUTH_TIMEOUT_MS
    ),
  });
}

/** Builds the configuration and prepares its credentials directory. */
export async function resolveConfig(
  env: Env = process.env,
  overrides?: ConfigOverrides
) {
  const config = buildConfig(env, overrides);
  await prepareCredentialsDir(config.credentialsDir);
  return config;
}
