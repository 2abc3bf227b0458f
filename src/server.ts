/**
 * MCP Server Configuration and Tool Registration
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { Config, ErrorFormat } from './config/environment.js';
import { YnabClient } from './services/ynab-client.js';
import { BudgetService } from './services/budget-service.js';
import { tools, handleToolCall } from './tools/index.js';
import type { ErrorPayload } from './utils/errors.js';
import { createLogger, type Logger } from './utils/logger.js';
import type { ToolResult } from './utils/result.js';

export const SERVER_NAME = 'budget-tools';
export const SERVER_VERSION = '0.1.0';

/**
 * Render an error payload in the configured format.
 */
export function renderError(error: ErrorPayload, format: ErrorFormat): string {
  return format === 'text' ? `Error: ${error.message}` : JSON.stringify(error, null, 2);
}

/**
 * Turn a dispatch result into MCP tool-call content.
 */
export function renderResult(
  result: ToolResult,
  format: ErrorFormat
): { content: { type: 'text'; text: string }[]; isError?: boolean } {
  if (result.ok) {
    return {
      content: [{ type: 'text', text: JSON.stringify(result.data, null, 2) }],
    };
  }
  return {
    content: [{ type: 'text', text: renderError(result.error, format) }],
    isError: true,
  };
}

export function createServer(config: Config, logger: Logger = createLogger(config.logLevel)): Server {
  // Initialize services; a missing token fails here, before any request
  const ynabClient = new YnabClient(config.accessToken);
  const budgetService = new BudgetService(ynabClient, {
    defaultBudgetId: config.defaultBudgetId,
    logger,
  });

  // Create MCP server
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // Register tool listing handler
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  // Register tool call handler
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const result = await handleToolCall(name, args ?? {}, budgetService, logger);
    return renderResult(result, config.errorFormat);
  });

  return server;
}
