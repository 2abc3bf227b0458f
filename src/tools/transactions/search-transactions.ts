/**
 * Search Transactions Tool
 *
 * Finds transactions whose payee name or memo contains a search term.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { BudgetService, SearchTransactionsOptions } from '../../services/budget-service.js';
import type { TransactionSearchResult } from '../../types.js';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '../../utils/pagination.js';
import { budgetIdProperty, budgetIdSchema, isoDateSchema } from '../shared.js';

// Input schema
const inputSchema = z.object({
  budget_id: budgetIdSchema,
  search_term: z
    .string()
    .refine((term) => term.trim() !== '', 'search_term must not be empty')
    .describe('Text to look for in payee names and memos (case-insensitive)'),
  since_date: isoDateSchema.optional().describe('Only search on or after this date (YYYY-MM-DD)'),
  until_date: isoDateSchema.optional().describe('Only search on or before this date (YYYY-MM-DD)'),
  limit: z
    .number()
    .int()
    .min(1)
    .max(MAX_PAGE_SIZE)
    .optional()
    .describe(`Maximum results (default ${DEFAULT_PAGE_SIZE}, max ${MAX_PAGE_SIZE})`),
});

// Tool definition
export const searchTransactionsTool: Tool = {
  name: 'search_transactions',
  description: `Search transactions by payee name or memo.

Use when the user asks:
- "Find my Amazon purchases"
- "Show transactions mentioning 'birthday'"
- "When did I last pay the plumber?"

Matching is a case-insensitive substring match on payee name or memo.`,
  inputSchema: {
    type: 'object',
    properties: {
      budget_id: budgetIdProperty,
      search_term: {
        type: 'string',
        description: 'Text to look for in payee names and memos (case-insensitive)',
      },
      since_date: {
        type: 'string',
        description: 'Only search on or after this date (YYYY-MM-DD)',
      },
      until_date: {
        type: 'string',
        description: 'Only search on or before this date (YYYY-MM-DD)',
      },
      limit: {
        type: 'number',
        description: `Maximum results (default ${DEFAULT_PAGE_SIZE}, max ${MAX_PAGE_SIZE})`,
      },
    },
    required: ['search_term'],
  },
};

// Handler function
export async function handleSearchTransactions(
  args: Record<string, unknown>,
  service: BudgetService
): Promise<TransactionSearchResult> {
  const validated = inputSchema.parse(args);

  const options: SearchTransactionsOptions = {};
  if (validated.since_date !== undefined) options.sinceDate = validated.since_date;
  if (validated.until_date !== undefined) options.untilDate = validated.until_date;
  if (validated.limit !== undefined) options.limit = validated.limit;

  return service.searchTransactions(
    service.resolveBudgetId(validated.budget_id),
    validated.search_term,
    options
  );
}
