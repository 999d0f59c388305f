function envFlag(name: string) {
  const value = process.env[name];
  return value === "1" || value === "true";
}

const debugEnabled = envFlag("WORKSPACE_MCP_DEBUG");

let logTarget: "stdout" | "stderr" = envFlag("WORKSPACE_MCP_LOG_STDERR")
  ? "stderr"
  : "stdout";

/** The stdio transport owns stdout while serving; `serve` uses stderr. */
export function setLogTarget(target: "stdout" | "stderr") {
  logTarget = target;
}

function logLine(message: string) {
  if (logTarget === "stderr") {
    console.error(message);
    return;
  }
  console.log(message);
}

export function info(message: string) {
  logLine(message);
}

export function warn(message: string) {
  console.error(message);
}

export function error(message: string) {
  console.error(message);
}

export function debug(message: string) {
  if (!debugEnabled) {
    return;
  }
  logLine(`[debug] ${message}`);
}

export type AccountLog = {
  info(message: string): void;
  warn(message: string): void;
  debug(message: string): void;
};

/** Prefixes every line with the account it concerns. */
export function forAccount(accountId: string): AccountLog {
  const prefix = `[${accountId}]`;
  return {
    info: (message) => info(`${prefix} ${message}`),
    warn: (message) => warn(`${prefix} ${message}`),
    debug: (message) => debug(`${prefix} ${message}`),
  };
}
