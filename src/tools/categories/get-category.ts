/**
 * Get Category Tool
 *
 * Returns a single category, including goal details when it has a goal.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { BudgetService } from '../../services/budget-service.js';
import type { Category } from '../../types.js';
import { budgetIdProperty, budgetIdSchema } from '../shared.js';

// Input schema
const inputSchema = z.object({
  budget_id: budgetIdSchema,
  category_id: z.string().min(1).describe('The category UUID'),
});

// Tool definition
export const getCategoryTool: Tool = {
  name: 'get_category',
  description: `Get details for a single category.

Use when the user asks:
- "How much is left in Groceries?"
- "What's my goal for the vacation fund?"

Returns budgeted, activity and balance for the current month, plus goal fields when a goal is set.`,
  inputSchema: {
    type: 'object',
    properties: {
      budget_id: budgetIdProperty,
      category_id: {
        type: 'string',
        description: 'The category UUID',
      },
    },
    required: ['category_id'],
  },
};

// Handler function
export async function handleGetCategory(
  args: Record<string, unknown>,
  service: BudgetService
): Promise<Category> {
  const validated = inputSchema.parse(args);
  return service.getCategory(service.resolveBudgetId(validated.budget_id), validated.category_id);
}
