#!/usr/bin/env node

/**
 * userstore-server entry point: MCP over stdio
 * All logging goes to stderr; stdout is reserved for protocol frames
 */

import * as path from "node:path";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { ensureDirectory } from "@userstore/sdk";
import { loadServerConfig } from "./config.js";
import { createServer } from "./server.js";
import { Logger } from "./observability/logger.js";
import { MetricsRegistry } from "./observability/metrics.js";
import { UserStoreService } from "./service/userstore.js";

async function main(): Promise<void> {
  // A stray console.log would corrupt the protocol stream
  const redirectToStderr =
    (method: string) =>
    (...args: unknown[]): void => {
      console.error(`[WARN] Attempted ${method} (redirected to stderr):`, ...args);
    };
  console.log = redirectToStderr("console.log");
  console.info = redirectToStderr("console.info");
  console.debug = redirectToStderr("console.debug");

  const config = loadServerConfig();

  if (!config.enabled) {
    console.error("MCP user store server is disabled (MCP_USERSTORE_ENABLED=false)");
    return;
  }

  const logger = new Logger(config.logLevel);
  const metrics = new MetricsRegistry();

  await ensureDirectory(path.dirname(config.dataFile));
  const service = UserStoreService.open(config.dataFile, logger);
  const server = createServer({ service, logger, metrics, readOnly: config.readOnly });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", {
    mode: config.readOnly ? "readonly" : "readwrite",
    data_file: config.dataFile,
  });

  const shutdown = async (): Promise<void> => {
    logger.info("server.shutdown", { metrics: metrics.getAllMetrics() });
    await server.close();
    await service.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error("server.shutdown_failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  new Logger().error("server.fatal", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
