/**
 * Get Month Summary Tool
 *
 * Returns a month's income, totals and per-category figures.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { BudgetService } from '../../services/budget-service.js';
import type { MonthSummary } from '../../types.js';
import { budgetIdProperty, budgetIdSchema, monthProperty, monthSchema } from '../shared.js';

// Input schema
const inputSchema = z.object({
  budget_id: budgetIdSchema,
  month: monthSchema,
});

// Tool definition
export const getMonthSummaryTool: Tool = {
  name: 'get_month_summary',
  description: `Get the budget summary for a month.

Use when the user asks:
- "How did I do in March?"
- "How much is left to budget this month?"
- "What's my income this month?"

Returns income, total budgeted, activity and balance across all categories,
to_be_budgeted, age of money, and one line per category with its group name.`,
  inputSchema: {
    type: 'object',
    properties: {
      budget_id: budgetIdProperty,
      month: monthProperty,
    },
    required: ['month'],
  },
};

// Handler function
export async function handleGetMonthSummary(
  args: Record<string, unknown>,
  service: BudgetService
): Promise<MonthSummary> {
  const validated = inputSchema.parse(args);
  return service.getMonthSummary(service.resolveBudgetId(validated.budget_id), validated.month);
}
