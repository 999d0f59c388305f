import { promises as fs } from "node:fs";
import path from "node:path";
import { expect, test } from "vitest";
import {
  defaultCredentialsDir,
  prepareCredentialsDir,
  resolveCredentialsDir,
} from "../src/config/paths.js";
import { DirectoryUnwritableError } from "../src/errors.js";
import { makeTempDir } from "./fixtures/google.js";

const HOME = "/home/tester";

test("primary variable wins over the legacy one", () => {
  const dir = resolveCredentialsDir(
    {
      WORKSPACE_MCP_CREDENTIALS_DIR: "/srv/creds/a",
      GOOGLE_MCP_CREDENTIALS_DIR: "/srv/creds/b",
    },
    HOME
  );
  expect(dir).toBe("/srv/creds/a");
});

test("legacy variable is used when the primary is unset", () => {
  const dir = resolveCredentialsDir(
    { GOOGLE_MCP_CREDENTIALS_DIR: "/srv/legacy" },
    HOME
  );
  expect(dir).toBe("/srv/legacy");
});

test("blank primary falls through to the legacy variable", () => {
  const dir = resolveCredentialsDir(
    {
      WORKSPACE_MCP_CREDENTIALS_DIR: "  ",
      GOOGLE_MCP_CREDENTIALS_DIR: "/srv/legacy",
    },
    HOME
  );
  expect(dir).toBe("/srv/legacy");
});

test("default lives under the home directory", () => {
  expect(resolveCredentialsDir({}, HOME)).toBe(
    "/home/tester/.google_workspace_mcp/credentials"
  );
  expect(defaultCredentialsDir(HOME)).toBe(
    path.join(HOME, ".google_workspace_mcp", "credentials")
  );
});

test("tilde is expanded against the home directory", () => {
  const dir = resolveCredentialsDir(
    { WORKSPACE_MCP_CREDENTIALS_DIR: "~/work/creds" },
    HOME
  );
  expect(dir).toBe("/home/tester/work/creds");
});

test("relative paths resolve to absolute ones", () => {
  const dir = resolveCredentialsDir(
    { WORKSPACE_MCP_CREDENTIALS_DIR: "creds" },
    HOME
  );
  expect(dir).toBe(path.resolve("creds"));
});

test("resolution is deterministic", () => {
  const env = { GOOGLE_MCP_CREDENTIALS_DIR: "/srv/legacy" };
  expect(resolveCredentialsDir(env, HOME)).toBe(
    resolveCredentialsDir(env, HOME)
  );
});

test("prepareCredentialsDir creates missing directories", async () => {
  const root = await makeTempDir();
  const target = path.join(root, "nested", "creds");
  await expect(prepareCredentialsDir(target)).resolves.toBe(target);
  const stat = await fs.stat(target);
  expect(stat.isDirectory()).toBe(true);
});

test("prepareCredentialsDir rejects a path below a regular file", async () => {
  const root = await makeTempDir();
  const blocker = path.join(root, "blocker");
  await fs.writeFile(blocker, "not a directory");
  const target = path.join(blocker, "creds");

  const err = await prepareCredentialsDir(target).catch((e: unknown) => e);
  expect(err).toBeInstanceOf(DirectoryUnwritableError);
  expect(err).toMatchObject({ code: "DirectoryUnwritable", directory: target });
});
