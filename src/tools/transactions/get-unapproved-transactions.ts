/**
 * Get Unapproved Transactions Tool
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { BudgetService } from '../../services/budget-service.js';
import type { Transaction } from '../../types.js';
import { budgetIdProperty, budgetIdSchema } from '../shared.js';

// Input schema
const inputSchema = z.object({
  budget_id: budgetIdSchema,
});

// Tool definition
export const getUnapprovedTransactionsTool: Tool = {
  name: 'get_unapproved_transactions',
  description: `List transactions that still need approval.

Use when the user asks:
- "What transactions need review?"
- "Show unapproved transactions"

Deleted transactions are excluded.`,
  inputSchema: {
    type: 'object',
    properties: {
      budget_id: budgetIdProperty,
    },
  },
};

// Handler function
export async function handleGetUnapprovedTransactions(
  args: Record<string, unknown>,
  service: BudgetService
): Promise<Transaction[]> {
  const validated = inputSchema.parse(args);
  return service.getUnapprovedTransactions(service.resolveBudgetId(validated.budget_id));
}
