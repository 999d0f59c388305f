import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import getPort from "get-port";
import { afterEach, expect, test, vi } from "vitest";
import { AccountMismatchError } from "../src/errors.js";
import { AccountBinder } from "../src/mcp/account-binder.js";
import { createMcpServer } from "../src/mcp/server.js";
import type { ToolModule } from "../src/mcp/types.js";
import {
  type FetchLike,
  GOOGLE_AUTH_URL,
  GOOGLE_TOKEN_URL,
  GOOGLE_USERINFO_URL,
} from "../src/oauth/google.js";
import { createRuntime } from "../src/runtime.js";
import {
  fakeFetch,
  jsonResponse,
  makeConfig,
  makeRecord,
  makeTempDir,
} from "./fixtures/google.js";

const cleanups: Array<() => Promise<void>> = [];

afterEach(async () => {
  while (cleanups.length > 0) {
    const cleanup = cleanups.pop();
    await cleanup?.();
  }
});

const googleFetch = fakeFetch(({ url }) => {
  if (url === GOOGLE_USERINFO_URL) {
    return jsonResponse({ email: "alice@example.com", name: "Alice" });
  }
  if (url === GOOGLE_TOKEN_URL) {
    return jsonResponse({ error: "invalid_grant" }, 400);
  }
  return new Response("unexpected", { status: 500 });
});

async function connect(options?: {
  records?: ReturnType<typeof makeRecord>[];
  tools?: Readonly<Record<string, ToolModule>>;
  fetchFn?: FetchLike;
}) {
  const dir = await makeTempDir();
  const port = await getPort({ host: "127.0.0.1" });
  const config = makeConfig(dir, {
    WORKSPACE_MCP_PORT: String(port),
    WORKSPACE_MCP_BASE_URI: "http://127.0.0.1",
  });
  const context = createRuntime(config, {
    fetchFn: options?.fetchFn ?? googleFetch.fn,
    openBrowser: async () => undefined,
  });
  for (const record of options?.records ?? []) {
    await context.store.save(record.accountId, record);
  }
  await context.binder.bind();

  const server = createMcpServer(context, {
    version: "0.0.0",
    tools: options?.tools,
  });
  const client = new Client({ name: "workspace-mcp-test", version: "0.0.0" });
  const [clientTransport, serverTransport] =
    InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  await client.connect(clientTransport);
  cleanups.push(async () => {
    await context.flow.cancelActive();
    await client.close();
    await server.close();
  });
  return { client, context };
}

async function callTool(
  client: Client,
  name: string,
  args: Record<string, unknown> = {}
) {
  const result = CallToolResultSchema.parse(
    await client.callTool({ name, arguments: args })
  );
  const first = result.content.find((item) => item.type === "text");
  return {
    result,
    text: first && first.type === "text" ? first.text : "",
  };
}

test("lists the auth tools", async () => {
  const { client } = await connect();
  const tools = await client.listTools();
  const names = tools.tools.map((tool) => tool.name);
  expect(names).toEqual([
    "get_auth_status",
    "start_google_auth",
    "get_google_user",
  ]);

  const startAuth = tools.tools.find(
    (tool) => tool.name === "start_google_auth"
  );
  expect(startAuth?.inputSchema.properties).toHaveProperty("user_google_email");
  expect(startAuth?.inputSchema.required ?? []).not.toContain(
    "user_google_email"
  );
});

test("auth status reports an unbound server", async () => {
  const { client } = await connect();
  const { text, result } = await callTool(client, "get_auth_status");
  expect(result.isError).toBeFalsy();
  expect(text).toBe(
    "No Google account is signed in. Call start_google_auth to authorize one."
  );
});

test("auth status reports the bound account", async () => {
  const { client } = await connect({ records: [makeRecord()] });
  const { text } = await callTool(client, "get_auth_status");
  expect(text).toBe("alice@example.com: auth ok.");
});

test("Google tools return an auth-required error when unbound", async () => {
  const { client } = await connect();
  const { text, result } = await callTool(client, "get_google_user");
  expect(result.isError).toBe(true);
  expect(text).toBe(
    "Google authentication required. No Google account is signed in. Run start_google_auth (or `workspace-mcp login`) first. Call start_google_auth to sign in again."
  );
});

test("Google tools call through with the bound account's token", async () => {
  const { client } = await connect({
    records: [makeRecord({ accessToken: "access-live" })],
  });
  const { text, result } = await callTool(client, "get_google_user");
  expect(result.isError).toBeFalsy();
  expect(text).toBe("alice@example.com (Alice)");
  expect(result.structuredContent).toEqual({
    email: "alice@example.com",
    name: "Alice",
  });
  const userinfo = googleFetch.requests.at(-1);
  expect(userinfo?.url).toBe(GOOGLE_USERINFO_URL);
  expect(userinfo?.headers.get("authorization")).toBe("Bearer access-live");
});

test("revoked refresh token surfaces as an auth-required error", async () => {
  const { client, context } = await connect({
    records: [makeRecord({ expiresAt: Date.now() - 1000 })],
  });
  const { text, result } = await callTool(client, "get_google_user");
  expect(result.isError).toBe(true);
  expect(text.startsWith("Google authentication required.")).toBe(true);
  const stored = await context.store.load("alice@example.com");
  expect(stored.refreshInvalid).toBe(true);
});

function signInAs(email: string) {
  return fakeFetch(({ url }) => {
    if (url === GOOGLE_TOKEN_URL) {
      return jsonResponse({
        access_token: "access-new",
        refresh_token: "refresh-new",
        expires_in: 3600,
      });
    }
    return jsonResponse({ email });
  });
}

// Follows the authorization URL's redirect the way Google would.
async function completeSignIn(authorizationUrl: string) {
  const url = new URL(authorizationUrl);
  const callback = new URL(url.searchParams.get("redirect_uri") ?? "");
  callback.searchParams.set("code", "auth-code");
  callback.searchParams.set("state", url.searchParams.get("state") ?? "");
  const response = await fetch(callback);
  return { status: response.status, page: await response.text() };
}

test("start_google_auth returns the URL and binds the account once the callback lands", async () => {
  const signIn = signInAs("alice@example.com");
  const { client, context } = await connect({ fetchFn: signIn.fn });

  const { text, result } = await callTool(client, "start_google_auth", {
    user_google_email: "alice@example.com",
  });
  expect(result.isError).toBeFalsy();
  const structured = result.structuredContent ?? {};
  const authorizationUrl = String(structured.authorizationUrl);
  expect(authorizationUrl.startsWith(GOOGLE_AUTH_URL)).toBe(true);
  expect(text).toContain(authorizationUrl);

  const second = await callTool(client, "start_google_auth");
  expect(second.result.isError).toBe(true);

  const { status } = await completeSignIn(authorizationUrl);
  expect(status).toBe(200);

  await vi.waitFor(() => {
    expect(context.binder.current?.accountId).toBe("alice@example.com");
  });
  const stored = await context.store.load("alice@example.com");
  expect(stored.accessToken).toBe("access-new");
});

test("start_google_auth for a second account leaves the bound one in place", async () => {
  const signIn = signInAs("bob@example.com");
  const { client, context } = await connect({
    records: [makeRecord()],
    fetchFn: signIn.fn,
  });

  const { result } = await callTool(client, "start_google_auth");
  const authorizationUrl = String(result.structuredContent?.authorizationUrl);
  const { status, page } = await completeSignIn(authorizationUrl);
  expect(status).toBe(400);
  expect(page).toContain("already holds alice@example.com.");

  await vi.waitFor(() => {
    expect(context.flow.state).toBe("failed");
  });
  expect(context.flow.failure).toBeInstanceOf(AccountMismatchError);
  expect(context.binder.current?.accountId).toBe("alice@example.com");
  expect(await context.store.list()).toEqual(["alice@example.com"]);

  const nextStart = new AccountBinder(context.config, context.store);
  expect((await nextStart.bind())?.accountId).toBe("alice@example.com");
});

test("a throwing handler becomes a tool error", async () => {
  const explode: ToolModule = {
    name: "explode",
    title: "Explode",
    description: "Always fails.",
    inputSchema: {},
    handler: async () => {
      throw new Error("boom");
    },
  };
  const { client } = await connect({ tools: { explode } });
  const { text, result } = await callTool(client, "explode");
  expect(result.isError).toBe(true);
  expect(text).toBe("Failed to run explode: Error: boom");
});
