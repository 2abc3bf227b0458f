/**
 * Update Category Budget Tool
 *
 * Sets the budgeted amount for a category in a specific month.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { BudgetService } from '../../services/budget-service.js';
import type { Category } from '../../types.js';
import {
  amountSchema,
  budgetIdProperty,
  budgetIdSchema,
  monthProperty,
  monthSchema,
} from '../shared.js';

// Input schema
const inputSchema = z.object({
  budget_id: budgetIdSchema,
  month: monthSchema,
  category_id: z.string().min(1).describe('The category UUID to update'),
  budgeted: amountSchema.describe('The new budgeted amount (e.g., 500.00)'),
});

// Tool definition
export const updateCategoryBudgetTool: Tool = {
  name: 'update_category_budget',
  description: `Set the budgeted amount for a category in a specific month.

Use when the user asks:
- "Budget $500 for Groceries this month"
- "Set my dining out budget to $200"

Use first-of-month format for the month parameter (e.g., 2024-01-01 for January 2024).
Requires a category_id. Use list_categories first to find the category ID.`,
  inputSchema: {
    type: 'object',
    properties: {
      budget_id: budgetIdProperty,
      month: monthProperty,
      category_id: {
        type: 'string',
        description: 'The category UUID to update',
      },
      budgeted: {
        type: 'number',
        description: 'The new budgeted amount',
      },
    },
    required: ['month', 'category_id', 'budgeted'],
  },
};

// Handler function
export async function handleUpdateCategoryBudget(
  args: Record<string, unknown>,
  service: BudgetService
): Promise<Category> {
  const validated = inputSchema.parse(args);
  return service.updateCategoryBudget(
    service.resolveBudgetId(validated.budget_id),
    validated.month,
    validated.category_id,
    validated.budgeted
  );
}
