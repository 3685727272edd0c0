import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { NetpolLensConfig } from "../types.js";
import type { Logger } from "../utils/logger.js";
import { PolicyWorkspace } from "../workspace/workspace.js";
import { getPrompt, listPrompts } from "./prompts.js";
import { selectResourceStrategy } from "./resources.js";
import { TOOL_DEFINITIONS, dispatchTool } from "./tools.js";

export const SERVER_NAME = "netpol-lens";
export const SERVER_VERSION = "0.1.0";

/**
 * Build a tool server bound to one workspace. Transport is attached by the
 * caller.
 */
export function createServer(workspace: PolicyWorkspace, config: NetpolLensConfig): Server {
  const resources = selectResourceStrategy(config.resources, workspace);

  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    {
      capabilities: {
        tools: {},
        prompts: {},
        ...resources.capabilities,
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return dispatchTool(workspace, name, args ?? {});
  });

  server.setRequestHandler(ListPromptsRequestSchema, async () => ({ prompts: listPrompts() }));

  server.setRequestHandler(GetPromptRequestSchema, async (request) => getPrompt(request.params.name));

  resources.register(server);
  return server;
}

/**
 * Serve the workspace over stdio until SIGINT/SIGTERM.
 */
export async function startStdioServer(config: NetpolLensConfig, logger: Logger): Promise<void> {
  const workspace = new PolicyWorkspace({ root: config.dataDir, logger });
  const server = createServer(workspace, config);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`serving ${workspace.healthcheck()} (resources ${config.resources})`);

  const shutdown = async (signal: string) => {
    logger.info(`received ${signal}, shutting down`);
    try {
      await server.close();
    } catch (err) {
      logger.error("error during shutdown:", err);
    }
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}
