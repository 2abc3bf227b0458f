/**
 * Move Category Funds Tool
 *
 * Moves budgeted money from one category to another within a month.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { BudgetService } from '../../services/budget-service.js';
import type { FundsMove } from '../../types.js';
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
  from_category_id: z.string().min(1).describe('Category to take money from'),
  to_category_id: z.string().min(1).describe('Category to give money to'),
  amount: amountSchema.describe('Amount to move'),
});

// Tool definition
export const moveCategoryFundsTool: Tool = {
  name: 'move_category_funds',
  description: `Move budgeted money from one category to another for a month.

Use when the user asks:
- "Move $50 from Dining Out to Groceries"
- "Cover my overspending in Gas with money from Fun"

The source is updated first, then the destination. If the second update
fails, the source change stays applied and the error lists it under "applied".
The amount is not checked against the source's available balance.`,
  inputSchema: {
    type: 'object',
    properties: {
      budget_id: budgetIdProperty,
      month: monthProperty,
      from_category_id: {
        type: 'string',
        description: 'Category to take money from',
      },
      to_category_id: {
        type: 'string',
        description: 'Category to give money to',
      },
      amount: {
        type: 'number',
        description: 'Amount to move',
      },
    },
    required: ['month', 'from_category_id', 'to_category_id', 'amount'],
  },
};

// Handler function
export async function handleMoveCategoryFunds(
  args: Record<string, unknown>,
  service: BudgetService
): Promise<FundsMove> {
  const validated = inputSchema.parse(args);
  return service.moveCategoryFunds(
    service.resolveBudgetId(validated.budget_id),
    validated.month,
    validated.from_category_id,
    validated.to_category_id,
    validated.amount
  );
}
