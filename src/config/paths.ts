import { constants, promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { DirectoryUnwritableError } from "../errors.js";

export const CREDENTIALS_DIR_ENV = "WORKSPACE_MCP_CREDENTIALS_DIR";
export const LEGACY_CREDENTIALS_DIR_ENV = "GOOGLE_MCP_CREDENTIALS_DIR";

type Env = Readonly<Record<string, string | undefined>>;

export function defaultCredentialsDir(homeDir = os.homedir()) {
  return path.join(homeDir, ".google_workspace_mcp", "credentials");
}

export function expandHome(value: string, homeDir = os.homedir()) {
  if (value === "~") {
    return homeDir;
  }
  if (value.startsWith("~/") || value.startsWith(`~${path.sep}`)) {
    return path.join(homeDir, value.slice(2));
  }
  return value;
}

function nonEmpty(value: string | undefined) {
  if (value === undefined) {
    return;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Picks the credentials directory from the environment. Pure: the same
 * inputs always give the same absolute path, and once either override is
 * present the default is never consulted.
 */
export function resolveCredentialsDir(
  env: Env = process.env,
  homeDir = os.homedir()
) {
  const chosen =
    nonEmpty(env[CREDENTIALS_DIR_ENV]) ??
    nonEmpty(env[LEGACY_CREDENTIALS_DIR_ENV]) ??
    defaultCredentialsDir(homeDir);
  return path.resolve(expandHome(chosen, homeDir));
}

export async function prepareCredentialsDir(dir: string) {
  try {
    await fs.mkdir(dir, { recursive: true, mode: 0o700 });
    const stat = await fs.stat(dir);
    if (!stat.isDirectory()) {
      throw new Error(`${dir} is not a directory`);
    }
    await fs.access(dir, constants.R_OK | constants.W_OK);
  } catch (err) {
    throw new DirectoryUnwritableError(dir, { cause: err });
  }
  return dir;
}
