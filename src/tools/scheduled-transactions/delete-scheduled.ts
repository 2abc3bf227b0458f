/**
 * Delete Scheduled Transaction Tool
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { BudgetService } from '../../services/budget-service.js';
import type { ScheduledTransaction } from '../../types.js';
import { budgetIdProperty, budgetIdSchema } from '../shared.js';

// Input schema
const inputSchema = z.object({
  budget_id: budgetIdSchema,
  scheduled_transaction_id: z.string().min(1).describe('The scheduled transaction UUID to delete'),
});

// Tool definition
export const deleteScheduledTransactionTool: Tool = {
  name: 'delete_scheduled_transaction',
  description: `Delete a scheduled transaction.

Use when the user asks:
- "Cancel that recurring payment"
- "Remove the scheduled gym membership"

Returns the deleted scheduled transaction. This cannot be undone.`,
  inputSchema: {
    type: 'object',
    properties: {
      budget_id: budgetIdProperty,
      scheduled_transaction_id: {
        type: 'string',
        description: 'The scheduled transaction UUID to delete',
      },
    },
    required: ['scheduled_transaction_id'],
  },
};

// Handler function
export async function handleDeleteScheduledTransaction(
  args: Record<string, unknown>,
  service: BudgetService
): Promise<ScheduledTransaction> {
  const validated = inputSchema.parse(args);
  return service.deleteScheduledTransaction(
    service.resolveBudgetId(validated.budget_id),
    validated.scheduled_transaction_id
  );
}
