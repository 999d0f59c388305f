import http from "node:http";
import type { Socket } from "node:net";
import { URL } from "node:url";

export type CallbackOutcome = { ok: boolean; message: string };

export type CallbackRequest = {
  code: string | null;
  state: string | null;
  error: string | null;
  errorDescription: string | null;
  /** Sends the acknowledgment page; resolves once the response is flushed. */
  reply(outcome: CallbackOutcome): Promise<void>;
};

export type CallbackListener = {
  redirectUri: string;
  port: number;
  callback: Promise<CallbackRequest>;
  close(): Promise<void>;
};

function escapeHtml(value: string) {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function renderCallbackPage(outcome: CallbackOutcome) {
  const title = outcome.ok
    ? "Authentication complete"
    : "Authentication failed";
  return [
    "<!doctype html>",
    `<html><head><meta charset="utf-8"><title>${title}</title></head>`,
    '<body style="font-family: system-ui; text-align: center; padding: 48px;">',
    `<h1>${title}</h1>`,
    `<p>${escapeHtml(outcome.message)}</p>`,
    "</body></html>",
  ].join("\n");
}

export function parseRedirectUri(redirectUri: string) {
  const url = new URL(redirectUri);
  if (url.protocol !== "http:") {
    throw new Error(`Invalid redirect URI protocol: ${redirectUri}`);
  }
  const port = Number(url.port);
  if (!port || Number.isNaN(port)) {
    throw new Error(
      `Redirect URI must include an explicit port (e.g. http://localhost:8000/oauth2callback), got: ${redirectUri}`
    );
  }
  return { url, port };
}

/**
 * Binds a one-shot HTTP listener for the OAuth redirect. The first request
 * on the callback path is handed to the caller; `close` destroys every open
 * socket so the port is free as soon as it resolves.
 */
export async function startCallbackServer(
  redirectUri: string
): Promise<CallbackListener> {
  const { url: redirectUrl, port } = parseRedirectUri(redirectUri);
  const server = http.createServer();
  const sockets = new Set<Socket>();
  let handled = false;

  server.on("connection", (socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
  });

  // Every caller waits on the same close, so none resolves before the port
  // is released.
  let closing: Promise<void> | null = null;
  const close = () => {
    if (!closing) {
      closing = new Promise<void>((resolve) => {
        for (const socket of sockets) {
          socket.destroy();
        }
        server.close(() => resolve());
      });
    }
    return closing;
  };

  const callback = new Promise<CallbackRequest>((resolve) => {
    server.on("request", (req, res) => {
      const url = new URL(req.url ?? "/", redirectUrl);
      if (req.method !== "GET" || url.pathname !== redirectUrl.pathname) {
        res.writeHead(404, { "content-type": "text/plain" });
        res.end("Not found");
        return;
      }
      if (handled) {
        res.writeHead(409, { "content-type": "text/html; charset=utf-8" });
        res.end(
          renderCallbackPage({
            ok: false,
            message: "This authorization request was already handled.",
          })
        );
        return;
      }
      handled = true;
      const reply = (outcome: CallbackOutcome) =>
        new Promise<void>((done) => {
          if (res.writableEnded || res.destroyed) {
            done();
            return;
          }
          res.once("finish", () => done());
          res.once("close", () => done());
          res.writeHead(outcome.ok ? 200 : 400, {
            "content-type": "text/html; charset=utf-8",
            "cache-control": "no-store",
            connection: "close",
          });
          res.end(renderCallbackPage(outcome));
        });
      resolve({
        code: url.searchParams.get("code"),
        state: url.searchParams.get("state"),
        error: url.searchParams.get("error"),
        errorDescription: url.searchParams.get("error_description"),
        reply,
      });
    });
  });

  await new Promise<void>((resolve, reject) => {
    const onError = (err: unknown) => {
      reject(err);
    };
    server.once("error", onError);
    server.listen(port, redirectUrl.hostname, () => {
      server.off("error", onError);
      resolve();
    });
  }).catch((err: unknown) => {
    if (err instanceof Error && "code" in err && err.code === "EADDRINUSE") {
      throw new Error(
        `OAuth callback port ${port} is already in use (redirect URI: ${redirectUri}). Stop the other process or set WORKSPACE_MCP_PORT.`,
        { cause: err }
      );
    }
    throw err;
  });

  return { redirectUri, port, callback, close };
}
