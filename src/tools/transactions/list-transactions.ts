/**
 * List Transactions Tool
 *
 * Returns one page of transactions for a budget with optional filters.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { BudgetService, ListTransactionsOptions } from '../../services/budget-service.js';
import type { TransactionPage } from '../../types.js';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '../../utils/pagination.js';
import { budgetIdProperty, budgetIdSchema, isoDateSchema } from '../shared.js';

// Input schema
const inputSchema = z.object({
  budget_id: budgetIdSchema,
  since_date: isoDateSchema
    .optional()
    .describe('Only return transactions on or after this date (YYYY-MM-DD)'),
  until_date: isoDateSchema
    .optional()
    .describe('Only return transactions on or before this date (YYYY-MM-DD)'),
  account_id: z.string().min(1).optional().describe('Only return transactions in this account'),
  category_id: z
    .string()
    .min(1)
    .optional()
    .describe('Only return transactions in this category'),
  limit: z
    .number()
    .int()
    .min(1)
    .max(MAX_PAGE_SIZE)
    .optional()
    .describe(`Transactions per page (default ${DEFAULT_PAGE_SIZE}, max ${MAX_PAGE_SIZE})`),
  page: z.number().int().min(1).optional().describe('Page number, starting at 1 (default 1)'),
});

// Tool definition
export const listTransactionsTool: Tool = {
  name: 'list_transactions',
  description: `List transactions for a budget, one page at a time.

Use when the user asks:
- "Show my recent transactions"
- "What did I spend in January?"
- "Show transactions in my checking account"
- "List transactions in the Groceries category"

Filters: since_date and until_date (inclusive), account_id, category_id.
Returns the page of transactions plus pagination metadata
(page, per_page, total_count, total_pages, has_next_page, has_prev_page).`,
  inputSchema: {
    type: 'object',
    properties: {
      budget_id: budgetIdProperty,
      since_date: {
        type: 'string',
        description: 'Only return transactions on or after this date (YYYY-MM-DD)',
      },
      until_date: {
        type: 'string',
        description: 'Only return transactions on or before this date (YYYY-MM-DD)',
      },
      account_id: {
        type: 'string',
        description: 'Only return transactions in this account',
      },
      category_id: {
        type: 'string',
        description: 'Only return transactions in this category',
      },
      limit: {
        type: 'number',
        description: `Transactions per page (default ${DEFAULT_PAGE_SIZE}, max ${MAX_PAGE_SIZE})`,
      },
      page: {
        type: 'number',
        description: 'Page number, starting at 1 (default 1)',
      },
    },
  },
};

// Handler function
export async function handleListTransactions(
  args: Record<string, unknown>,
  service: BudgetService
): Promise<TransactionPage> {
  const validated = inputSchema.parse(args);

  const options: ListTransactionsOptions = {};
  if (validated.since_date !== undefined) options.sinceDate = validated.since_date;
  if (validated.until_date !== undefined) options.untilDate = validated.until_date;
  if (validated.account_id !== undefined) options.accountId = validated.account_id;
  if (validated.category_id !== undefined) options.categoryId = validated.category_id;
  if (validated.limit !== undefined) options.limit = validated.limit;
  if (validated.page !== undefined) options.page = validated.page;

  return service.listTransactions(service.resolveBudgetId(validated.budget_id), options);
}
