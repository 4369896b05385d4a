/**
 * MCP server for the user store
 * Exposes list/get/create/delete tools; transport is chosen by the caller
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { createToolHandlers, isToolName, READ_ONLY_TOOLS, toolDefinitions, type ToolContext } from "./tools.js";
import { errorCode } from "./observability/logger.js";
import { toMcpError } from "./errors.js";

export const SERVER_NAME = "userstore-server";
export const SERVER_VERSION = "0.1.0";

export interface CreateServerOptions extends ToolContext {
  readOnly?: boolean;
}

export function createServer(options: CreateServerOptions): Server {
  const { logger, readOnly = false } = options;
  const handlers = createToolHandlers(options);
  const isAllowed = (name: string): boolean =>
    !readOnly || READ_ONLY_TOOLS.some((tool) => tool === name);

  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: toolDefinitions.filter((tool) => isAllowed(tool.name)),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (!isToolName(name)) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }
      if (!isAllowed(name)) {
        throw new McpError(ErrorCode.InvalidRequest, `Tool '${name}' not available in read-only mode`);
      }

      return await handlers[name](args);
    } catch (error) {
      logger.error("server.tool.error", {
        tool: name,
        err_code: errorCode(error),
        err_message: error instanceof Error ? error.message : String(error),
      });

      throw toMcpError(error);
    }
  });

  return server;
}
