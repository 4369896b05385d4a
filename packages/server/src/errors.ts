/**
 * Mapping of thrown errors to MCP protocol errors
 */

import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { isRecordStoreError } from "@userstore/sdk";

/**
 * Raised when a tool does not settle within its time budget
 */
export class ToolTimeoutError extends Error {
  readonly code = "ETIMEDOUT";

  constructor(tool: string, timeoutMs: number) {
    super(`Tool ${tool} timed out after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}

export function toMcpError(error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }

  if (error instanceof z.ZodError) {
    return new McpError(
      ErrorCode.InvalidParams,
      `Validation error: ${error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join(", ")}`
    );
  }

  if (isRecordStoreError(error)) {
    switch (error.code) {
      case "VALIDATION_FAILED":
        return new McpError(ErrorCode.InvalidParams, error.message);
      case "NOT_FOUND":
      case "DUPLICATE_ID":
        return new McpError(ErrorCode.InvalidRequest, error.message);
      case "STORAGE_UNAVAILABLE":
      case "CORRUPT_STATE":
        return new McpError(ErrorCode.InternalError, error.message);
    }
  }

  if (error instanceof ToolTimeoutError) {
    return new McpError(ErrorCode.RequestTimeout, error.message);
  }

  return new McpError(ErrorCode.InternalError, error instanceof Error ? error.message : String(error));
}
