/**
 * List Accounts Tool
 *
 * Returns all open and closed accounts in a budget. Deleted accounts are omitted.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { BudgetService } from '../../services/budget-service.js';
import type { Account } from '../../types.js';
import { budgetIdProperty, budgetIdSchema } from '../shared.js';

// Input schema
const inputSchema = z.object({
  budget_id: budgetIdSchema,
});

// Tool definition
export const listAccountsTool: Tool = {
  name: 'list_accounts',
  description: `List all accounts in a budget with their current balances.

Use when the user asks:
- "What accounts do I have?"
- "Show my account balances"
- "How much is in my checking account?"

Balances are decimal amounts in the budget's currency.`,
  inputSchema: {
    type: 'object',
    properties: {
      budget_id: budgetIdProperty,
    },
  },
};

// Handler function
export async function handleListAccounts(
  args: Record<string, unknown>,
  service: BudgetService
): Promise<Account[]> {
  const validated = inputSchema.parse(args);
  return service.listAccounts(service.resolveBudgetId(validated.budget_id));
}
