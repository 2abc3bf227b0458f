/**
 * List Categories Tool
 *
 * Returns category groups with their categories.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { BudgetService } from '../../services/budget-service.js';
import type { CategoryGroup } from '../../types.js';
import { budgetIdProperty, budgetIdSchema } from '../shared.js';

// Input schema
const inputSchema = z.object({
  budget_id: budgetIdSchema,
  include_hidden: z
    .boolean()
    .optional()
    .describe('Include hidden and deleted categories (default false)'),
});

// Tool definition
export const listCategoriesTool: Tool = {
  name: 'list_categories',
  description: `List all category groups and categories in a budget.

Use when the user asks:
- "What categories do I have?"
- "Show my budget categories"
- "How much is left in each category?"

Hidden categories are omitted unless include_hidden is true. Groups with no
remaining categories are omitted.`,
  inputSchema: {
    type: 'object',
    properties: {
      budget_id: budgetIdProperty,
      include_hidden: {
        type: 'boolean',
        description: 'Include hidden and deleted categories (default false)',
      },
    },
  },
};

// Handler function
export async function handleListCategories(
  args: Record<string, unknown>,
  service: BudgetService
): Promise<CategoryGroup[]> {
  const validated = inputSchema.parse(args);
  return service.listCategories(
    service.resolveBudgetId(validated.budget_id),
    validated.include_hidden ?? false
  );
}
