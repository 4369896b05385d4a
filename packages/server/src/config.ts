/**
 * Server configuration from environment variables
 */

import * as path from "node:path";
import { isLogLevel, type LogLevel } from "./observability/logger.js";

export interface ServerConfig {
  /** Absolute path of the backing JSON file */
  dataFile: string;
  logLevel: LogLevel;
  /** Only the read tools are exposed */
  readOnly: boolean;
  /** When false the server exits without serving */
  enabled: boolean;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const logLevel = env.LOG_LEVEL?.toLowerCase() ?? "info";

  return {
    dataFile: path.resolve(env.DATA_FILE || "./data/users.json"),
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
    readOnly: env.MCP_USERSTORE_READONLY === "true",
    enabled: env.MCP_USERSTORE_ENABLED !== "false",
  };
}
