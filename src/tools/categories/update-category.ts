/**
 * Update Category Tool
 *
 * Renames a category, edits its note, moves it to another group or
 * changes its goal target.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { BudgetService, CategoryChanges } from '../../services/budget-service.js';
import type { Category } from '../../types.js';
import { amountSchema, budgetIdProperty, budgetIdSchema } from '../shared.js';

// Input schema
const inputSchema = z.object({
  budget_id: budgetIdSchema,
  category_id: z.string().min(1).describe('The category UUID to update'),
  name: z.string().min(1).max(200).optional().describe('New category name'),
  note: z.string().max(500).optional().describe('New category note'),
  category_group_id: z.string().min(1).optional().describe('Move the category to this group'),
  goal_target: amountSchema.optional().describe('New goal target amount'),
});

// Tool definition
export const updateCategoryTool: Tool = {
  name: 'update_category',
  description: `Update a category's name, note, group or goal target.

Use when the user asks:
- "Rename Dining Out to Restaurants"
- "Move Gym into the Health group"
- "Raise my vacation goal to $3000"

At least one field must be given; only given fields change.
goal_target only applies to categories that already have a goal.`,
  inputSchema: {
    type: 'object',
    properties: {
      budget_id: budgetIdProperty,
      category_id: {
        type: 'string',
        description: 'The category UUID to update',
      },
      name: {
        type: 'string',
        description: 'New category name',
      },
      note: {
        type: 'string',
        description: 'New category note',
      },
      category_group_id: {
        type: 'string',
        description: 'Move the category to this group',
      },
      goal_target: {
        type: 'number',
        description: 'New goal target amount',
      },
    },
    required: ['category_id'],
  },
};

// Handler function
export async function handleUpdateCategory(
  args: Record<string, unknown>,
  service: BudgetService
): Promise<Category> {
  const validated = inputSchema.parse(args);

  const changes: CategoryChanges = {};
  if (validated.name !== undefined) changes.name = validated.name;
  if (validated.note !== undefined) changes.note = validated.note;
  if (validated.category_group_id !== undefined)
    changes.categoryGroupId = validated.category_group_id;
  if (validated.goal_target !== undefined) changes.goalTarget = validated.goal_target;

  return service.updateCategory(
    service.resolveBudgetId(validated.budget_id),
    validated.category_id,
    changes
  );
}
