/**
 * MCP tool implementations for the user store
 * Every tool returns a text summary plus the same data as structured content
 */

import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import {
  CreateUserInputSchema,
  DeleteUserInputSchema,
  GetUserInputSchema,
  ListUsersInputSchema,
} from "./schemas.js";
import type { UserStoreService } from "./service/userstore.js";
import { errorCode, type Logger } from "./observability/logger.js";
import { recordToolExecution, type MetricsRegistry } from "./observability/metrics.js";
import { ToolTimeoutError } from "./errors.js";

export type ToolName = "list_users" | "get_user" | "create_user" | "delete_user";

export type ToolHandler = (args: unknown) => Promise<CallToolResult>;

export const READ_ONLY_TOOLS: readonly ToolName[] = ["list_users", "get_user"];

const DEFAULT_TIMEOUTS: Record<ToolName, number> = {
  list_users: 2000,
  get_user: 2000,
  create_user: 5000,
  delete_user: 5000,
};

export interface ToolContext {
  service: UserStoreService;
  logger: Logger;
  metrics: MetricsRegistry;
  timeouts?: Partial<Record<ToolName, number>>;
}

export function isToolName(name: string): name is ToolName {
  return toolDefinitions.some((tool) => tool.name === name);
}

function result(text: string, structuredContent: Record<string, unknown>): CallToolResult {
  return {
    content: [{ type: "text", text }],
    structuredContent,
  };
}

/**
 * Build the tool handlers around one service instance
 */
export function createToolHandlers(context: ToolContext): Record<ToolName, ToolHandler> {
  const { service, logger, metrics } = context;

  // Wraps a handler with timeout, logging, and metrics
  async function executeTool<T>(tool: ToolName, handler: () => Promise<T>): Promise<T> {
    const timeoutMs = context.timeouts?.[tool] ?? DEFAULT_TIMEOUTS[tool];
    const startTime = Date.now();
    let success = false;
    let failure: unknown;
    let timedOut = false;
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    const handlerPromise = handler();
    // The store operation keeps running after a timeout; report its late failure
    void handlerPromise.catch((err: unknown) => {
      if (timedOut) {
        logger.warn("tool.late_error", {
          tool,
          err_code: errorCode(err),
          err_message: err instanceof Error ? err.message : String(err),
        });
      }
    });

    try {
      const timeoutPromise = new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => {
          timedOut = true;
          reject(new ToolTimeoutError(tool, timeoutMs));
        }, timeoutMs);
      });

      const value = await Promise.race([handlerPromise, timeoutPromise]);
      success = true;
      return value;
    } catch (err) {
      failure = err;
      throw err;
    } finally {
      if (timeoutId !== undefined) {
        clearTimeout(timeoutId);
      }
      const duration = Date.now() - startTime;
      logger.toolCall(tool, duration, success, failure);
      recordToolExecution(metrics, tool, duration, success, success ? undefined : errorCode(failure));
    }
  }

  return {
    /**
     * list_users: every user in insertion order
     */
    async list_users(args) {
      ListUsersInputSchema.parse(args ?? {});

      return executeTool("list_users", async () => {
        const users = await service.list();
        return result(`Found ${users.length} users`, { users, count: users.length });
      });
    },

    /**
     * get_user: one user, or null when the id is unknown
     */
    async get_user(args) {
      const { id } = GetUserInputSchema.parse(args);

      return executeTool("get_user", async () => {
        const user = await service.get(id);
        return result(user ? `Found user ${id}` : `User ${id} not found`, { user });
      });
    },

    async create_user(args) {
      const payload = CreateUserInputSchema.parse(args);

      return executeTool("create_user", async () => {
        const user = await service.create(payload);
        return result(`Created user ${user.id}`, { user });
      });
    },

    async delete_user(args) {
      const { id } = DeleteUserInputSchema.parse(args);

      return executeTool("delete_user", async () => {
        await service.delete(id);
        return result(`Deleted user ${id}`, { ok: true, id });
      });
    },
  };
}

/**
 * Tool definitions advertised by the MCP server
 */
export const toolDefinitions: Tool[] = [
  {
    name: "list_users",
    description: "List all users in insertion order",
    inputSchema: {
      type: "object",
      properties: {},
    },
  },
  {
    name: "get_user",
    description: "Retrieve a user by ID (returns null when absent)",
    inputSchema: {
      type: "object",
      properties: {
        id: { type: "string", description: "User ID" },
      },
      required: ["id"],
    },
  },
  {
    name: "create_user",
    description: "Create a user; the ID is generated when omitted. Fails if the ID is taken",
    inputSchema: {
      type: "object",
      properties: {
        id: { type: "string", description: "Optional user ID" },
        name: { type: "string", description: "Display name (1-200 characters)" },
        email: { type: "string", description: "Optional e-mail address" },
        phone: { type: "string", description: "Optional phone number (max 40 characters)" },
      },
      required: ["name"],
      additionalProperties: false,
    },
  },
  {
    name: "delete_user",
    description: "Delete a user by ID. Fails if no user has the ID",
    inputSchema: {
      type: "object",
      properties: {
        id: { type: "string", description: "User ID" },
      },
      required: ["id"],
    },
  },
];
