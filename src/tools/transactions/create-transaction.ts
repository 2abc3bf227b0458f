/**
 * Create Transaction Tool
 *
 * Creates a new transaction in a budget.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { BudgetService, NewTransactionInput } from '../../services/budget-service.js';
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
  account_id: z.string().min(1).describe('The account UUID for this transaction'),
  date: isoDateSchema.describe('Transaction date in YYYY-MM-DD format'),
  amount: amountSchema.describe(
    'Amount (negative for outflow, positive for inflow). E.g., -50.00 for a $50 expense'
  ),
  payee_id: z.string().min(1).optional().describe('Payee UUID'),
  payee_name: textSchema(200)
    .optional()
    .describe('Payee name (creates new payee if payee_id not provided)'),
  category_id: z.string().min(1).optional().describe('Category UUID (use list_categories to find)'),
  memo: textSchema(200).optional().describe('Transaction memo/note'),
  cleared: z
    .enum(clearedStatuses)
    .optional()
    .describe('Cleared status: cleared, uncleared, or reconciled (default uncleared)'),
  approved: z.boolean().optional().describe('Whether the transaction is approved (default false)'),
  flag_color: z.enum(flagColors).optional().describe('Flag color for the transaction'),
});

// Tool definition
export const createTransactionTool: Tool = {
  name: 'create_transaction',
  description: `Create a new transaction in a budget.

Use when the user asks:
- "Add a transaction for $50 at the hardware store"
- "Record a purchase"
- "Log an expense"

Amount should be negative for expenses/outflows and positive for income/inflows.
New transactions are uncleared and unapproved unless stated otherwise.`,
  inputSchema: {
    type: 'object',
    properties: {
      budget_id: budgetIdProperty,
      account_id: {
        type: 'string',
        description: 'The account UUID for this transaction',
      },
      date: {
        type: 'string',
        description: 'Transaction date in YYYY-MM-DD format',
      },
      amount: {
        type: 'number',
        description: 'Amount (negative for outflow, positive for inflow)',
      },
      payee_id: {
        type: 'string',
        description: 'Payee UUID',
      },
      payee_name: {
        type: 'string',
        description: 'Payee name (creates new payee if payee_id not provided)',
      },
      category_id: {
        type: 'string',
        description: 'Category UUID',
      },
      memo: {
        type: 'string',
        description: 'Transaction memo/note',
      },
      cleared: {
        type: 'string',
        enum: clearedStatuses,
        description: 'Cleared status (default uncleared)',
      },
      approved: {
        type: 'boolean',
        description: 'Whether the transaction is approved (default false)',
      },
      flag_color: {
        type: 'string',
        enum: flagColors,
        description: 'Flag color',
      },
    },
    required: ['account_id', 'date', 'amount'],
  },
};

// Handler function
export async function handleCreateTransaction(
  args: Record<string, unknown>,
  service: BudgetService
): Promise<Transaction> {
  const validated = inputSchema.parse(args);

  // Only include defined fields
  const input: NewTransactionInput = {
    accountId: validated.account_id,
    date: validated.date,
    amount: validated.amount,
  };
  if (validated.payee_id !== undefined) input.payeeId = validated.payee_id;
  if (validated.payee_name !== undefined) input.payeeName = validated.payee_name;
  if (validated.category_id !== undefined) input.categoryId = validated.category_id;
  if (validated.memo !== undefined) input.memo = validated.memo;
  if (validated.cleared !== undefined) input.cleared = validated.cleared;
  if (validated.approved !== undefined) input.approved = validated.approved;
  if (validated.flag_color !== undefined) input.flagColor = validated.flag_color;

  return service.createTransaction(service.resolveBudgetId(validated.budget_id), input);
}
