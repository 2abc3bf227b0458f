/**
 * List Budgets Tool
 *
 * Returns all budgets the user has access to.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { BudgetService } from '../../services/budget-service.js';
import type { Budget } from '../../types.js';

// Input schema
const inputSchema = z.object({});

// Tool definition
export const listBudgetsTool: Tool = {
  name: 'list_budgets',
  description: `List all budgets the user has access to.

Use when the user asks:
- "What budgets do I have?"
- "List my budgets"
- "Which budget should I use?"

Returns budget names, IDs, last modified dates and currency formats.`,
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

// Handler function
export async function handleListBudgets(
  args: Record<string, unknown>,
  service: BudgetService
): Promise<Budget[]> {
  inputSchema.parse(args);
  return service.listBudgets();
}
