import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  StdioServerTransport,
} from "@modelcontextprotocol/sdk/server/stdio.js";
import { error, info } from "../utils/log.js";
import { PACKAGE_NAME } from "../version.js";
import { TOOLS, toolError } from "./tools.js";
import type { ToolContext, ToolModule } from "./types.js";

const INSTRUCTIONS =
  "Tools act on Google Workspace as the single account this server is " +
  "bound to. If a tool reports that Google authentication is required, " +
  "call start_google_auth, show the returned URL to the user, and retry " +
  "once they have approved access.";

export function createMcpServer(
  context: ToolContext,
  options: { version: string; tools?: Readonly<Record<string, ToolModule>> }
) {
  const server = new McpServer(
    { name: PACKAGE_NAME, version: options.version },
    { instructions: INSTRUCTIONS }
  );
  for (const tool of Object.values(options.tools ?? TOOLS)) {
    server.registerTool(
      tool.name,
      {
        title: tool.title,
        description: tool.description,
        inputSchema: tool.inputSchema,
      },
      async (args: Record<string, unknown>) => {
        try {
          return await tool.handler(args, context);
        } catch (err) {
          error(`${tool.name} failed: ${String(err)}`);
          return toolError(`Failed to run ${tool.name}: ${String(err)}`);
        }
      }
    );
  }
  return server;
}

export async function startStdioServer(server: McpServer) {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  info("MCP server is running (stdio).");
  return transport;
}
