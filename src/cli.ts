#!/usr/bin/env node
import { confirm } from "@inquirer/prompts";
import { Command } from "commander";
import type { ConfigOverrides } from "./config/settings.js";
import { createMcpServer, startStdioServer } from "./mcp/server.js";
import { cancelOnSignals } from "./oauth/flow.js";
import { loadRuntime } from "./runtime.js";
import { normalizeAccountId } from "./security/credential-store.js";
import type { AuthStatus } from "./types.js";
import { error, info, setLogTarget, warn } from "./utils/log.js";
import { PACKAGE_VERSION } from "./version.js";

type GlobalOptions = {
  tools?: string;
  readOnly?: boolean;
  port?: string;
  clientId?: string;
  clientSecret?: string;
};

function toOverrides(options: GlobalOptions): ConfigOverrides {
  return {
    services: options.tools,
    readOnly: options.readOnly,
    callbackPort: options.port === undefined ? undefined : Number(options.port),
    clientId: options.clientId,
    clientSecret: options.clientSecret,
  };
}

function formatAuthStatus(status: AuthStatus): string {
  switch (status.status) {
    case "ok":
      return "ok";
    case "missing":
      return "needs login";
    case "expired":
      return "expired";
    case "invalid":
      return "needs relogin";
    case "corrupt":
      return "corrupt";
    default:
      return "unknown";
  }
}

function formatAccounts(rows: string[][]) {
  if (rows.length === 0) {
    return "No accounts stored.";
  }
  const headers = ["Account", "Auth", "Expires"];
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => row[index].length))
  );
  const formatRow = (row: string[]) =>
    row
      .map((cell, index) => cell.padEnd(widths[index]))
      .join("  ")
      .trimEnd();
  return [
    formatRow(headers),
    formatRow(widths.map((w) => "-".repeat(w))),
    ...rows.map(formatRow),
  ].join("\n");
}

async function handleLogin(
  options: GlobalOptions & { email?: string; open?: boolean }
) {
  const runtime = await loadRuntime(process.env, toOverrides(options));
  const release = cancelOnSignals(runtime.flow);
  try {
    const record = await runtime.flow.authorize({
      loginHint: options.email,
      launchBrowser: options.open !== false,
    });
    runtime.binder.rebind(record.accountId);
    info(
      `Signed in as ${record.accountId}. Credentials stored in ${runtime.config.credentialsDir}.`
    );
  } finally {
    release();
  }
}

async function handleList(options: GlobalOptions) {
  const runtime = await loadRuntime(process.env, toOverrides(options));
  const accounts = await runtime.store.list();
  const rows: string[][] = [];
  for (const accountId of accounts) {
    const status = await runtime.store.status(accountId);
    let expires = "";
    if (status.status !== "corrupt") {
      const record = await runtime.store.find(accountId);
      expires = record ? new Date(record.expiresAt).toISOString() : "";
    }
    rows.push([accountId, formatAuthStatus(status), expires]);
  }
  info(`Credentials directory: ${runtime.config.credentialsDir}`);
  info(formatAccounts(rows));
}

async function handleStatus(options: GlobalOptions) {
  const runtime = await loadRuntime(process.env, toOverrides(options));
  const { config } = runtime;
  info(`Credentials directory: ${config.credentialsDir}`);
  info(`Mode: ${config.mode}`);
  info(`Callback: ${config.redirectUri}`);
  const readOnly = config.readOnly ? " (read-only)" : "";
  info(`Services: ${config.services.join(", ")}${readOnly}`);
  const client = config.client
    ? "configured"
    : "missing (set GOOGLE_OAUTH_CLIENT_ID)";
  info(`OAuth client: ${client}`);
  const binding = await runtime.binder.bind();
  if (!binding) {
    info("Account: none (run `workspace-mcp login`)");
    return;
  }
  const status = await runtime.store.status(binding.accountId);
  info(`Account: ${binding.accountId} (auth: ${formatAuthStatus(status)})`);
}

async function handleRemove(
  email: string,
  options: GlobalOptions & { yes?: boolean }
) {
  const runtime = await loadRuntime(process.env, toOverrides(options));
  const accountId = normalizeAccountId(email);
  const accounts = await runtime.store.list();
  if (!accounts.includes(accountId)) {
    warn(
      `No stored credential for "${accountId}" in ${runtime.config.credentialsDir}.`
    );
    return;
  }
  if (!options.yes) {
    if (!process.stdin.isTTY) {
      throw new Error(
        "Refusing to remove credentials without a TTY. Pass --yes to confirm."
      );
    }
    const confirmed = await confirm({
      message: `Delete the stored credential for "${accountId}"?`,
      default: false,
    });
    if (!confirmed) {
      info("Remove cancelled.");
      return;
    }
  }
  await runtime.store.delete(accountId);
  info(`Removed credential for "${accountId}".`);
}

async function handleServe(options: GlobalOptions) {
  setLogTarget("stderr");
  const runtime = await loadRuntime(process.env, toOverrides(options));
  await runtime.binder.bind();
  const server = createMcpServer(runtime, { version: PACKAGE_VERSION });

  let shuttingDown = false;
  const shutdown = async (reason: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    info(`Shutting down (${reason}).`);
    await runtime.flow.cancelActive();
    runtime.binder.release();
    await server.close();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          error(`Shutdown failed: ${String(err)}`);
          process.exit(1);
        }
      );
    });
  }
  server.server.onclose = () => {
    shutdown("transport closed").catch((err: unknown) => {
      error(`Shutdown failed: ${String(err)}`);
    });
  };

  await startStdioServer(server);
}

async function main() {
  const program = new Command();
  program
    .name("workspace-mcp")
    .description(
      "Google Workspace MCP server bound to one account per credentials directory"
    )
    .version(PACKAGE_VERSION)
    .option(
      "--tools <services>",
      "Services to enable (gmail, drive, docs, sheets, script, chat)"
    )
    .option("--read-only", "Request read-only scopes")
    .option("--port <port>", "OAuth callback port")
    .option("--client-id <clientId>", "Google OAuth client ID")
    .option("--client-secret <clientSecret>", "Google OAuth client secret");

  program
    .command("serve")
    .description("Start the MCP server on stdio")
    .action(async () => {
      await handleServe(program.opts<GlobalOptions>());
    });

  program
    .command("login")
    .description("Sign in to Google and store the credential")
    .option("--email <email>", "Account to pre-select on the consent screen")
    .option(
      "--no-open",
      "Print the authorization URL without opening a browser"
    )
    .action(async (options: { email?: string; open?: boolean }) => {
      await handleLogin({ ...program.opts<GlobalOptions>(), ...options });
    });

  program
    .command("list")
    .description("List stored accounts and their auth status")
    .action(async () => {
      await handleList(program.opts<GlobalOptions>());
    });

  program
    .command("status")
    .description("Show the resolved configuration and bound account")
    .action(async () => {
      await handleStatus(program.opts<GlobalOptions>());
    });

  program
    .command("remove")
    .argument("<email>", "Account whose stored credential should be deleted")
    .option("-y, --yes", "Skip the confirmation prompt")
    .description("Delete a stored credential")
    .action(async (email: string, options: { yes?: boolean }) => {
      await handleRemove(email, {
        ...program.opts<GlobalOptions>(),
        ...options,
      });
    });

  if (process.argv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
