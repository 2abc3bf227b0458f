/**
 * Category Spending Summary Tool
 *
 * Totals a category's spending between two dates, month by month.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { BudgetService } from '../../services/budget-service.js';
import type { CategorySpendingSummary } from '../../types.js';
import { budgetIdProperty, budgetIdSchema, isoDateSchema } from '../shared.js';

// Input schema
const inputSchema = z.object({
  budget_id: budgetIdSchema,
  category_id: z.string().min(1).describe('The category UUID to analyze'),
  since_date: isoDateSchema.describe('Start of the period (YYYY-MM-DD, inclusive)'),
  until_date: isoDateSchema.describe('End of the period (YYYY-MM-DD, inclusive)'),
  include_graph: z
    .boolean()
    .optional()
    .describe('Attach a text bar chart of the monthly series (default true)'),
});

// Tool definition
export const categorySpendingSummaryTool: Tool = {
  name: 'get_category_spending_summary',
  description: `Summarize spending in one category over a date range.

Use when the user asks:
- "How much did I spend on groceries this year?"
- "What's my average monthly dining spend since January?"
- "Show my gas spending month by month"

Returns the total spent, the average per month (over every month in the range,
including months with no spending), the transaction count and a monthly breakdown.
Refunds reduce the amount spent.`,
  inputSchema: {
    type: 'object',
    properties: {
      budget_id: budgetIdProperty,
      category_id: {
        type: 'string',
        description: 'The category UUID to analyze',
      },
      since_date: {
        type: 'string',
        description: 'Start of the period (YYYY-MM-DD, inclusive)',
      },
      until_date: {
        type: 'string',
        description: 'End of the period (YYYY-MM-DD, inclusive)',
      },
      include_graph: {
        type: 'boolean',
        description: 'Attach a text bar chart of the monthly series (default true)',
      },
    },
    required: ['category_id', 'since_date', 'until_date'],
  },
};

// Handler function
export async function handleCategorySpendingSummary(
  args: Record<string, unknown>,
  service: BudgetService
): Promise<CategorySpendingSummary> {
  const validated = inputSchema.parse(args);
  return service.getCategorySpendingSummary(
    service.resolveBudgetId(validated.budget_id),
    validated.category_id,
    validated.since_date,
    validated.until_date,
    validated.include_graph ?? true
  );
}
