/**
 * Update Transaction Tool
 *
 * Updates an existing transaction, keeping every field not given.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { BudgetService, TransactionChanges } from '../../services/budget-service.js';
import type { Transaction } from '../../types.js';
import { clearedStatuses, flagColors } from '../../utils/transaction-constants.js';
import {
  amountSchema,
  budgetIdProperty,
  budgetIdSchema,
  isoDateSchema,
  textSchema,
} from '../shared.js';

// Input schema
const inputSchema = z.object({
  budget_id: budgetIdSchema,
  transaction_id: z.string().min(1).describe('The transaction UUID to update'),
  account_id: z.string().min(1).optional().describe('New account UUID'),
  date: isoDateSchema.optional().describe('New transaction date in YYYY-MM-DD format'),
  amount: amountSchema
    .optional()
    .describe('New amount (negative for outflow, positive for inflow)'),
  payee_id: z.string().min(1).optional().describe('New payee UUID'),
  payee_name: textSchema(200).optional().describe('New payee name'),
  category_id: z.string().min(1).optional().describe('New category UUID'),
  memo: textSchema(200).optional().describe('New memo/note'),
  cleared: z.enum(clearedStatuses).optional().describe('New cleared status'),
  approved: z.boolean().optional().describe('New approved status'),
  flag_color: z.enum(flagColors).optional().describe('New flag color'),
});

// Tool definition
export const updateTransactionTool: Tool = {
  name: 'update_transaction',
  description: `Update an existing transaction.

Use when the user asks:
- "Change the category on that transaction"
- "Update the amount"
- "Mark transaction as cleared"
- "Add a memo to the transaction"

Only provide the fields you want to change; all others keep their current values.`,
  inputSchema: {
    type: 'object',
    properties: {
      budget_id: budgetIdProperty,
      transaction_id: {
        type: 'string',
        description: 'The transaction UUID to update',
      },
      account_id: {
        type: 'string',
        description: 'New account UUID',
      },
      date: {
        type: 'string',
        description: 'New transaction date in YYYY-MM-DD format',
      },
      amount: {
        type: 'number',
        description: 'New amount (negative for outflow, positive for inflow)',
      },
      payee_id: {
        type: 'string',
        description: 'New payee UUID',
      },
      payee_name: {
        type: 'string',
        description: 'New payee name',
      },
      category_id: {
        type: 'string',
        description: 'New category UUID',
      },
      memo: {
        type: 'string',
        description: 'New memo/note',
      },
      cleared: {
        type: 'string',
        enum: clearedStatuses,
        description: 'New cleared status',
      },
      approved: {
        type: 'boolean',
        description: 'New approved status',
      },
      flag_color: {
        type: 'string',
        enum: flagColors,
        description: 'New flag color',
      },
    },
    required: ['transaction_id'],
  },
};

// Handler function
export async function handleUpdateTransaction(
  args: Record<string, unknown>,
  service: BudgetService
): Promise<Transaction> {
  const validated = inputSchema.parse(args);

  const changes: TransactionChanges = {};
  if (validated.account_id !== undefined) changes.accountId = validated.account_id;
  if (validated.date !== undefined) changes.date = validated.date;
  if (validated.amount !== undefined) changes.amount = validated.amount;
  if (validated.payee_id !== undefined) changes.payeeId = validated.payee_id;
  if (validated.payee_name !== undefined) changes.payeeName = validated.payee_name;
  if (validated.category_id !== undefined) changes.categoryId = validated.category_id;
  if (validated.memo !== undefined) changes.memo = validated.memo;
  if (validated.cleared !== undefined) changes.cleared = validated.cleared;
  if (validated.approved !== undefined) changes.approved = validated.approved;
  if (validated.flag_color !== undefined) changes.flagColor = validated.flag_color;

  return service.updateTransaction(
    service.resolveBudgetId(validated.budget_id),
    validated.transaction_id,
    changes
  );
}
