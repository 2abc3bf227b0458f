#!/usr/bin/env node

/**
 * Budget Tools MCP Server
 *
 * Exposes YNAB budgets, accounts, categories and transactions as MCP tools
 * over stdio.
 */

import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { createServer } from './server.js';
import { loadConfig } from './config/environment.js';
import { createLogger, type Logger } from './utils/logger.js';

// Store server reference for graceful shutdown
let server: Server | null = null;
let logger: Logger = createLogger();

async function shutdown(): Promise<void> {
  logger.info('Shutting down budget tools server...');
  if (server) {
    try {
      await server.close();
    } catch (error) {
      logger.debug(`Error during server close: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }
  process.exit(0);
}

async function main(): Promise<void> {
  // Load and validate configuration
  const config = loadConfig();
  logger = createLogger(config.logLevel);

  // Create the MCP server with all tools registered
  server = createServer(config, logger);

  // Create stdio transport for communication
  const transport = new StdioServerTransport();

  // Connect server to transport
  await server.connect(transport);

  // stderr only; stdout carries the protocol
  logger.info(`Budget tools server started (budget: ${config.defaultBudgetId})`);
}

// Handle graceful shutdown
process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());
process.stdin.on('close', () => void shutdown());

// Run the server
main().catch((error: unknown) => {
  logger.error('Failed to start budget tools server', error);
  process.exit(1);
});
