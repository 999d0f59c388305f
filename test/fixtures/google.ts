import { promises as fs } from "node:fs";
import net from "node:net";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import { buildConfig } from "../../src/config/settings.js";
import type { FetchLike } from "../../src/oauth/google.js";
import type { CredentialRecord, ResolvedConfig } from "../../src/types.js";

export async function makeTempDir(prefix = "workspace-mcp-") {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function makeConfig(
  credentialsDir: string,
  env: Record<string, string | undefined> = {}
): ResolvedConfig {
  return buildConfig({
    WORKSPACE_MCP_CREDENTIALS_DIR: credentialsDir,
    GOOGLE_OAUTH_CLIENT_ID: "test-client-id",
    GOOGLE_OAUTH_CLIENT_SECRET: "test-secret",
    ...env,
  });
}

export function makeRecord(
  overrides: Partial<CredentialRecord> = {}
): CredentialRecord {
  return {
    accountId: "alice@example.com",
    accessToken: "access-1",
    refreshToken: "refresh-1",
    expiresAt: Date.parse("2030-01-01T00:00:00.000Z"),
    scopes: ["openid", "https://www.googleapis.com/auth/userinfo.email"],
    tokenType: "Bearer",
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export type RecordedRequest = {
  url: string;
  body: URLSearchParams | null;
  headers: Headers;
};

function requestUrl(input: Parameters<FetchLike>[0]) {
  if (typeof input === "string") {
    return input;
  }
  return input instanceof URL ? input.toString() : input.url;
}

function requestBody(body: RequestInit["body"]) {
  if (body instanceof URLSearchParams) {
    return body;
  }
  return typeof body === "string" ? new URLSearchParams(body) : null;
}

/**
 * A fetch stand-in handed to the OAuth client's transport. It records every
 * request and answers from `respond`.
 */
export function fakeFetch(
  respond: (request: RecordedRequest) => Response | Promise<Response>
) {
  const requests: RecordedRequest[] = [];
  const fn = vi.fn<FetchLike>(async (input, init) => {
    const request: RecordedRequest = {
      url: requestUrl(input),
      body: requestBody(init?.body),
      headers: new Headers(init?.headers),
    };
    requests.push(request);
    return respond(request);
  });
  return { fn, requests };
}

/** Pins `Date.now` so expiry computed inside the OAuth client is stable. */
export function freezeDate(now: number) {
  vi.useFakeTimers({ toFake: ["Date"] });
  vi.setSystemTime(now);
}

/** Resolves once something else could bind `port` on the loopback host. */
export async function expectPortFree(port: number) {
  const server = net.createServer();
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, "127.0.0.1", () => resolve());
  });
  await new Promise<void>((resolve) => server.close(() => resolve()));
}
