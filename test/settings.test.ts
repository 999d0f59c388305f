import { expect, test } from "vitest";
import {
  buildConfig,
  buildRedirectUri,
  parseServices,
  resolveConfig,
} from "../src/config/settings.js";
import { ConfigurationError } from "../src/errors.js";
import {
  DOCS_SCOPE,
  DRIVE_SCOPE,
  GMAIL_READONLY_SCOPE,
  GMAIL_SEND_SCOPE,
  OPENID_SCOPE,
} from "../src/oauth/scopes.js";
import { makeTempDir } from "./fixtures/google.js";

test("defaults", () => {
  const config = buildConfig({ WORKSPACE_MCP_CREDENTIALS_DIR: "/srv/creds" });
  expect(config.credentialsDir).toBe("/srv/creds");
  expect(config.mode).toBe("single-user");
  expect(config.callbackPort).toBe(8000);
  expect(config.redirectUri).toBe("http://localhost:8000/oauth2callback");
  expect(config.services).toEqual(["gmail", "docs", "script"]);
  expect(config.readOnly).toBe(false);
  expect(config.authTimeoutMs).toBe(300_000);
  expect(config.client).toBeNull();
  expect(config.scopes[0]).toBe(OPENID_SCOPE);
  expect(config.scopes).toContain(GMAIL_SEND_SCOPE);
  expect(config.scopes).toContain(DOCS_SCOPE);
  expect(config.scopes).not.toContain(DRIVE_SCOPE);
});

test("config is frozen", () => {
  const config = buildConfig({ WORKSPACE_MCP_CREDENTIALS_DIR: "/srv/creds" });
  expect(Object.isFrozen(config)).toBe(true);
  expect(Object.isFrozen(config.scopes)).toBe(true);
});

test("port and base URI shape the redirect URI", () => {
  const config = buildConfig({
    WORKSPACE_MCP_CREDENTIALS_DIR: "/srv/creds",
    WORKSPACE_MCP_PORT: "9123",
    WORKSPACE_MCP_BASE_URI: "http://127.0.0.1",
  });
  expect(config.callbackPort).toBe(9123);
  expect(config.redirectUri).toBe("http://127.0.0.1:9123/oauth2callback");
});

test("overrides take precedence over the environment", () => {
  const config = buildConfig(
    {
      WORKSPACE_MCP_CREDENTIALS_DIR: "/srv/creds",
      WORKSPACE_MCP_PORT: "9000",
      WORKSPACE_MCP_TOOLS: "drive",
      GOOGLE_OAUTH_CLIENT_ID: "env-client",
    },
    {
      callbackPort: 9001,
      services: "gmail",
      readOnly: true,
      clientId: "flag-client",
    }
  );
  expect(config.callbackPort).toBe(9001);
  expect(config.services).toEqual(["gmail"]);
  expect(config.readOnly).toBe(true);
  expect(config.scopes).toContain(GMAIL_READONLY_SCOPE);
  expect(config.scopes).not.toContain(GMAIL_SEND_SCOPE);
  expect(config.client).toEqual({ clientId: "flag-client" });
});

test("client secret is optional", () => {
  const config = buildConfig({
    WORKSPACE_MCP_CREDENTIALS_DIR: "/srv/creds",
    GOOGLE_OAUTH_CLIENT_ID: "test-client-id",
    GOOGLE_OAUTH_CLIENT_SECRET: "test-secret",
  });
  expect(config.client).toEqual({
    clientId: "test-client-id",
    clientSecret: "test-secret",
  });
});

test("MCP_SINGLE_USER_MODE=0 selects multi-user mode", () => {
  const modeFor = (value: string) =>
    buildConfig({
      WORKSPACE_MCP_CREDENTIALS_DIR: "/srv/creds",
      MCP_SINGLE_USER_MODE: value,
    }).mode;
  expect(modeFor("0")).toBe("multi-user");
  expect(modeFor("1")).toBe("single-user");
});

test("invalid numbers raise ConfigurationError", () => {
  const withPort = (port: string) => () =>
    buildConfig({
      WORKSPACE_MCP_CREDENTIALS_DIR: "/srv/creds",
      WORKSPACE_MCP_PORT: port,
    });
  expect(withPort("abc")).toThrow(ConfigurationError);
  expect(withPort("70000")).toThrow(ConfigurationError);
  expect(() =>
    buildConfig({
      WORKSPACE_MCP_CREDENTIALS_DIR: "/srv/creds",
      WORKSPACE_MCP_AUTH_TIMEOUT_MS: "-5",
    })
  ).toThrow(ConfigurationError);
});

test("parseServices de-duplicates and rejects unknown names", () => {
  expect(parseServices("gmail, Drive gmail")).toEqual(["gmail", "drive"]);
  expect(parseServices("")).toEqual(["gmail", "docs", "script"]);
  expect(() => parseServices("gmail,calendar")).toThrow(
    'Unknown service "calendar".'
  );
});

test("buildRedirectUri drops any path or query on the base", () => {
  expect(buildRedirectUri("http://localhost/ignored?x=1", 8080)).toBe(
    "http://localhost:8080/oauth2callback"
  );
});

test("resolveConfig prepares the credentials directory", async () => {
  const root = await makeTempDir();
  const config = await resolveConfig({
    WORKSPACE_MCP_CREDENTIALS_DIR: `${root}/creds`,
  });
  expect(config.credentialsDir).toBe(`${root}/creds`);
});
