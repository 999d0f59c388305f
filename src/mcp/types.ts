import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";
import type { OAuthFlowController } from "../oauth/flow.js";
import type { GoogleTransport } from "../oauth/google.js";
import type { TokenRefresher } from "../oauth/refresher.js";
import type { CredentialStore } from "../security/credential-store.js";
import type { ResolvedConfig } from "../types.js";
import type { AccountBinder } from "./account-binder.js";

export type ToolContext = {
  config: ResolvedConfig;
  store: CredentialStore;
  binder: AccountBinder;
  refresher: TokenRefresher;
  flow: OAuthFlowController;
  transport: GoogleTransport;
};

export type GoogleAccess = {
  accountId: string;
  accessToken: string;
  tokenType: string;
};

export type ToolHandler = (
  args: Record<string, unknown>,
  context: ToolContext
) => Promise<CallToolResult>;

/** The one capability every entry of the tool table implements. */
export type ToolModule = {
  name: string;
  title: string;
  description: string;
  inputSchema: z.ZodRawShape;
  handler: ToolHandler;
};
