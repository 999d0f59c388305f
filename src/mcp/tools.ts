import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import {
  isWorkspaceAuthError,
  requiresReauthentication,
} from "../errors.js";
import type { AuthorizationAttempt } from "../oauth/flow.js";
import { createOAuthClient, fetchUserInfo } from "../oauth/google.js";
import { USERINFO_EMAIL_SCOPE } from "../oauth/scopes.js";
import { info, warn } from "../utils/log.js";
import type { GoogleAccess, ToolContext, ToolModule } from "./types.js";

export function toolError(message: string): CallToolResult {
  return {
    content: [{ type: "text" as const, text: message }],
    isError: true,
  };
}

export function toolText(
  text: string,
  structuredContent?: Record<string, unknown>
): CallToolResult {
  return {
    content: [{ type: "text" as const, text }],
    ...(structuredContent ? { structuredContent } : {}),
  };
}

/**
 * Wraps a handler that calls Google: resolves the bound account, hands the
 * handler a token valid for at least the refresh skew, and turns credential
 * failures into tool errors scoped to this call.
 */
export function withGoogleAccess(
  requiredScopes: readonly string[],
  handler: (
    args: Record<string, unknown>,
    context: ToolContext,
    access: GoogleAccess
  ) => Promise<CallToolResult>
) {
  return async (args: Record<string, unknown>, context: ToolContext) => {
    let access: GoogleAccess;
    try {
      const accountId = await context.binder.accountFor();
      const record = await context.refresher.getValidCredential(
        accountId,
        requiredScopes
      );
      access = {
        accountId: record.accountId,
        accessToken: record.accessToken,
        tokenType: record.tokenType,
      };
    } catch (err) {
      if (requiresReauthentication(err)) {
        const message = err instanceof Error ? err.message : String(err);
        return toolError(
          `Google authentication required. ${message} Call start_google_auth to sign in again.`
        );
      }
      if (isWorkspaceAuthError(err, "TokenRefreshError")) {
        return toolError(
          `Could not refresh the Google access token: ${err.message} Retry shortly.`
        );
      }
      throw err;
    }
    return handler(args, context, access);
  };
}

const getAuthStatusTool: ToolModule = {
  name: "get_auth_status",
  title: "Google auth status",
  description:
    "Show which Google account this server is bound to and whether its stored credential is usable.",
  inputSchema: {},
  handler: async (_args, context) => {
    const binding = context.binder.current;
    if (!binding) {
      return toolText(
        "No Google account is signed in. Call start_google_auth to authorize one.",
        { account: null, mode: context.config.mode }
      );
    }
    const status = await context.store.status(binding.accountId);
    const reason = status.reason ? ` ${status.reason}` : "";
    return toolText(`${binding.accountId}: auth ${status.status}.${reason}`, {
      account: binding.accountId,
      mode: context.config.mode,
      auth: status,
    });
  },
};

const startAuthInput = {
  user_google_email: z
    .string()
    .optional()
    .describe("Email address to pre-select on the Google consent screen."),
};
const startAuthSchema = z.object(startAuthInput);

const startGoogleAuthTool: ToolModule = {
  name: "start_google_auth",
  title: "Start Google sign-in",
  description:
    "Begin Google OAuth sign-in. Returns a URL the user must open; the server finishes the sign-in when Google redirects back.",
  inputSchema: startAuthInput,
  handler: async (args, context) => {
    const { user_google_email: loginHint } = startAuthSchema.parse(args);
    if (context.flow.isActive) {
      return toolError(
        "A Google sign-in is already waiting for the browser. Finish it or wait for it to time out."
      );
    }
    let attempt: AuthorizationAttempt;
    try {
      attempt = await context.flow.start({ loginHint });
    } catch (err) {
      return toolError(`Could not start Google sign-in: ${String(err)}`);
    }
    attempt.result
      .then((record) => context.binder.rebind(record.accountId))
      .then((binding) => {
        info(`Signed in as ${binding.accountId}.`);
      })
      .catch((err: unknown) => {
        warn(`Google sign-in did not complete: ${String(err)}`);
      });
    const minutes = Math.round(context.config.authTimeoutMs / 60_000);
    return toolText(
      `Open this URL to sign in to Google:\n${attempt.authorizationUrl}\n\nThe link is valid for about ${minutes} minute(s). After approving, retry the original request.`,
      { authorizationUrl: attempt.authorizationUrl }
    );
  },
};

const getGoogleUserTool: ToolModule = {
  name: "get_google_user",
  title: "Signed-in Google user",
  description:
    "Return the profile (email, name) of the signed-in Google account.",
  inputSchema: {},
  handler: withGoogleAccess(
    [USERINFO_EMAIL_SCOPE],
    async (_args, context, access) => {
      try {
        const user = await fetchUserInfo(
          createOAuthClient(context.config, context.transport),
          access.accessToken
        );
        const name = user.name ? ` (${user.name})` : "";
        return toolText(`${user.email}${name}`, {
          email: user.email,
          ...(user.name ? { name: user.name } : {}),
        });
      } catch (err) {
        return toolError(
          `Failed to fetch the Google profile for ${access.accountId}: ${String(err)}`
        );
      }
    }
  ),
};

export const TOOLS: Readonly<Record<string, ToolModule>> = Object.freeze({
  [getAuthStatusTool.name]: getAuthStatusTool,
  [startGoogleAuthTool.name]: startGoogleAuthTool,
  [getGoogleUserTool.name]: getGoogleUserTool,
});
