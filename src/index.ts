#!/usr/bin/env node
import "dotenv/config";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { run } from "./mcpServer.js";

run().catch((err: unknown) => {
  logger.error("Form builder MCP server failed to start", { error: errorMessage(err) });
  process.exit(1);
});
