/**
 * Create Scheduled Transaction Tool
 *
 * Creates a new scheduled transaction in a budget.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type {
  BudgetService,
  NewScheduledTransactionInput,
} from '../../services/budget-service.js';
import type { ScheduledTransaction } from '../../types.js';
import { flagColors, frequencies } from '../../utils/transaction-constants.js';
import {
  amountSchema,
  budgetIdProperty,
  budgetIdSchema,
  isoDateSchema,
  textSchema,
} from '../shared.js';

const FREQUENCY_DESCRIPTION = `Recurrence frequency: ${frequencies.join(', ')}`;

// Input schema
const inputSchema = z.object({
  budget_id: budgetIdSchema,
  account_id: z.string().min(1).describe('The account UUID for this scheduled transaction'),
  date: isoDateSchema.describe('First occurrence in YYYY-MM-DD format'),
  amount: amountSchema.describe(
    'Amount (negative for outflow, positive for inflow). E.g., -15.99 for a subscription'
  ),
  // Not restricted to the known values; YNAB reports unsupported ones
  frequency: z.string().min(1).describe(FREQUENCY_DESCRIPTION),
  payee_id: z.string().min(1).optional().describe('Payee UUID'),
  payee_name: textSchema(200)
    .optional()
    .describe('Payee name (creates new payee if payee_id not provided)'),
  category_id: z.string().min(1).optional().describe('Category UUID (use list_categories to find)'),
  memo: textSchema(200).optional().describe('Transaction memo/note'),
  flag_color: z.enum(flagColors).optional().describe('Flag color for the scheduled transaction'),
});

// Tool definition
export const createScheduledTransactionTool: Tool = {
  name: 'create_scheduled_transaction',
  description: `Create a new scheduled transaction (recurring bill, subscription, etc.) in a budget.

Use when the user asks:
- "Schedule a recurring payment"
- "Add my monthly rent as a scheduled transaction"
- "Set up a yearly insurance bill"

Amount should be negative for bills/outflows and positive for income/inflows.`,
  inputSchema: {
    type: 'object',
    properties: {
      budget_id: budgetIdProperty,
      account_id: {
        type: 'string',
        description: 'The account UUID for this scheduled transaction',
      },
      date: {
        type: 'string',
        description: 'First occurrence in YYYY-MM-DD format',
      },
      amount: {
        type: 'number',
        description: 'Amount (negative for outflow, positive for inflow)',
      },
      frequency: {
        type: 'string',
        description: FREQUENCY_DESCRIPTION,
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
      flag_color: {
        type: 'string',
        enum: flagColors,
        description: 'Flag color',
      },
    },
    required: ['account_id', 'date', 'amount', 'frequency'],
  },
};

// Handler function
export async function handleCreateScheduledTransaction(
  args: Record<string, unknown>,
  service: BudgetService
): Promise<ScheduledTransaction> {
  const validated = inputSchema.parse(args);

  const input: NewScheduledTransactionInput = {
    accountId: validated.account_id,
    date: validated.date,
    amount: validated.amount,
    frequency: validated.frequency,
  };
  if (validated.payee_id !== undefined) input.payeeId = validated.payee_id;
  if (validated.payee_name !== undefined) input.payeeName = validated.payee_name;
  if (validated.category_id !== undefined) input.categoryId = validated.category_id;
  if (validated.memo !== undefined) input.memo = validated.memo;
  if (validated.flag_color !== undefined) input.flagColor = validated.flag_color;

  return service.createScheduledTransaction(service.resolveBudgetId(validated.budget_id), input);
}
