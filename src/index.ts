#!/usr/bin/env node
import { loadConfig } from './config.js';
import { logger } from './logger.js';
import { SchoolServer } from './schoolServer.js';
import { describeError } from './utils.js';

async function main() {
  const config = loadConfig();
  logger.level = config.logLevel;
  const server = new SchoolServer(config);
  await server.start();
}

main().catch((error: unknown) => {
  logger.error(`Fatal error starting SchoolConnect MCP server: ${describeError(error)}`);
  process.exit(1);
});
