/**
 * List Scheduled Transactions Tool
 *
 * Returns upcoming and recurring transactions. Deleted ones are omitted.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { BudgetService } from '../../services/budget-service.js';
import type { ScheduledTransaction } from '../../types.js';
import { budgetIdProperty, budgetIdSchema } from '../shared.js';

// Input schema
const inputSchema = z.object({
  budget_id: budgetIdSchema,
});

// Tool definition
export const listScheduledTransactionsTool: Tool = {
  name: 'list_scheduled_transactions',
  description: `List scheduled (recurring or future) transactions.

Use when the user asks:
- "What bills are coming up?"
- "Show my recurring transactions"
- "What subscriptions do I have scheduled?"`,
  inputSchema: {
    type: 'object',
    properties: {
      budget_id: budgetIdProperty,
    },
  },
};

// Handler function
export async function handleListScheduledTransactions(
  args: Record<string, unknown>,
  service: BudgetService
): Promise<ScheduledTransaction[]> {
  const validated = inputSchema.parse(args);
  return service.listScheduledTransactions(service.resolveBudgetId(validated.budget_id));
}
