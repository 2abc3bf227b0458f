/**
 * Schema pieces shared by several tools.
 */

import { z } from 'zod';
import type { BudgetService } from '../services/budget-service.js';
import { sanitizeString } from '../utils/sanitize.js';

export type ToolHandler = (args: Record<string, unknown>, service: BudgetService) => Promise<unknown>;

const BUDGET_ID_DESCRIPTION = 'Budget UUID. Defaults to YNAB_BUDGET_ID env var or "last-used"';

export const budgetIdSchema = z.string().min(1).optional().describe(BUDGET_ID_DESCRIPTION);

export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format');

export const monthSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-01$/, 'Month must be first-of-month format (YYYY-MM-01)')
  .describe('The budget month in YYYY-MM-01 format (first of month, e.g., 2024-01-01)');

export const amountSchema = z.number().finite();

/** Free text sent to YNAB (memos, payee names), stripped of control characters. */
export function textSchema(maxLength: number) {
  return z
    .string()
    .max(maxLength)
    .transform((value) => sanitizeString(value, maxLength) ?? '');
}

// JSON Schema counterparts for the MCP tool listing

export const budgetIdProperty = {
  type: 'string',
  description: BUDGET_ID_DESCRIPTION,
} as const;

export const monthProperty = {
  type: 'string',
  description: 'The budget month in YYYY-MM-01 format (first of month)',
} as const;
