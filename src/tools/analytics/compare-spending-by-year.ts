/**
 * Compare Spending By Year Tool
 *
 * Year-over-year spending in one category.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { MAX_COMPARISON_YEARS, type BudgetService } from '../../services/budget-service.js';
import type { YearlySpendingComparison } from '../../types.js';
import { budgetIdProperty, budgetIdSchema } from '../shared.js';

// Input schema
const inputSchema = z.object({
  budget_id: budgetIdSchema,
  category_id: z.string().min(1).describe('The category UUID to analyze'),
  start_year: z.number().int().min(1900).max(9999).describe('First year to include (e.g., 2021)'),
  num_years: z
    .number()
    .int()
    .min(1)
    .max(MAX_COMPARISON_YEARS)
    .optional()
    .describe(`Number of consecutive years (default 5, max ${MAX_COMPARISON_YEARS})`),
  include_graph: z
    .boolean()
    .optional()
    .describe('Attach a text bar chart of the yearly totals (default true)'),
});

// Tool definition
export const compareSpendingByYearTool: Tool = {
  name: 'compare_spending_by_year',
  description: `Compare a category's spending across consecutive years.

Use when the user asks:
- "Am I spending more on dining than last year?"
- "Compare my utilities spending for the last five years"

Each year lists the total spent, the transaction count, and the change from
the year before in absolute and percentage terms (null for the first year,
and percentage null when the prior year had no spending).`,
  inputSchema: {
    type: 'object',
    properties: {
      budget_id: budgetIdProperty,
      category_id: {
        type: 'string',
        description: 'The category UUID to analyze',
      },
      start_year: {
        type: 'number',
        description: 'First year to include (e.g., 2021)',
      },
      num_years: {
        type: 'number',
        description: `Number of consecutive years (default 5, max ${MAX_COMPARISON_YEARS})`,
      },
      include_graph: {
        type: 'boolean',
        description: 'Attach a text bar chart of the yearly totals (default true)',
      },
    },
    required: ['category_id', 'start_year'],
  },
};

// Handler function
export async function handleCompareSpendingByYear(
  args: Record<string, unknown>,
  service: BudgetService
): Promise<YearlySpendingComparison> {
  const validated = inputSchema.parse(args);
  return service.compareSpendingByYear(
    service.resolveBudgetId(validated.budget_id),
    validated.category_id,
    validated.start_year,
    validated.num_years ?? 5,
    validated.include_graph ?? true
  );
}
