import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { createServerContext, type ServerContext } from "./context.js";
import { ToolRegistry } from "./tool-registry.js";
import { getToolDefinitions } from "./matching-tools.js";
import { startHttpServer } from "./http-app.js";
import { logInfo, logError, getErrorMessage } from "../core/logging.js";

// Server configuration
const SERVER_NAME = "grant-match-engine";
const SERVER_VERSION = "1.0.0";

export function createMcpServer(ctx: ServerContext): Server {
  const registry = new ToolRegistry(getToolDefinitions());

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.describe(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    registry.call(request.params.name, request.params.arguments, ctx),
  );

  return server;
}

async function main(): Promise<void> {
  const ctx = await createServerContext();

  const shutdown = (signal: string): void => {
    logInfo(`Received ${signal}, shutting down...`);
    ctx.close();
    process.exit(0);
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  if (process.argv.includes("--stdio")) {
    const server = createMcpServer(ctx);
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logInfo(`${SERVER_NAME} v${SERVER_VERSION} running on stdio`);
    return;
  }

  await startHttpServer(ctx);
  logInfo(`${SERVER_NAME} v${SERVER_VERSION} running over HTTP`);
}

main().catch((err: unknown) => {
  logError("Fatal error:", getErrorMessage(err));
  process.exit(1);
});
