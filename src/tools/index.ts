/**
 * Tool Registry
 *
 * Central registry for all MCP tools. Each tool module exports:
 * - A Tool definition object
 * - A handler function taking validated arguments to a BudgetService call
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { BudgetService } from '../services/budget-service.js';
import { ValidationError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { settle, type ToolResult } from '../utils/result.js';
import type { ToolHandler } from './shared.js';

// Budget tools
import { listBudgetsTool, handleListBudgets } from './budgets/list-budgets.js';

// Account tools
import { listAccountsTool, handleListAccounts } from './accounts/list-accounts.js';

// Category tools
import { listCategoriesTool, handleListCategories } from './categories/list-categories.js';
import { getCategoryTool, handleGetCategory } from './categories/get-category.js';
import {
  updateCategoryBudgetTool,
  handleUpdateCategoryBudget,
} from './categories/update-category-budget.js';
import { updateCategoryTool, handleUpdateCategory } from './categories/update-category.js';
import {
  moveCategoryFundsTool,
  handleMoveCategoryFunds,
} from './categories/move-category-funds.js';

// Month tools
import { getMonthSummaryTool, handleGetMonthSummary } from './months/get-month-summary.js';

// Transaction tools
import {
  listTransactionsTool,
  handleListTransactions,
} from './transactions/list-transactions.js';
import {
  searchTransactionsTool,
  handleSearchTransactions,
} from './transactions/search-transactions.js';
import {
  createTransactionTool,
  handleCreateTransaction,
} from './transactions/create-transaction.js';
import {
  updateTransactionTool,
  handleUpdateTransaction,
} from './transactions/update-transaction.js';
import {
  getUnapprovedTransactionsTool,
  handleGetUnapprovedTransactions,
} from './transactions/get-unapproved-transactions.js';

// Scheduled transaction tools
import {
  listScheduledTransactionsTool,
  handleListScheduledTransactions,
} from './scheduled-transactions/list-scheduled.js';
import {
  createScheduledTransactionTool,
  handleCreateScheduledTransaction,
} from './scheduled-transactions/create-scheduled.js';
import {
  deleteScheduledTransactionTool,
  handleDeleteScheduledTransaction,
} from './scheduled-transactions/delete-scheduled.js';

// Analytics tools
import {
  categorySpendingSummaryTool,
  handleCategorySpendingSummary,
  compareSpendingByYearTool,
  handleCompareSpendingByYear,
} from './analytics/index.js';

// Export all tool definitions
export const tools: Tool[] = [
  // Budgets
  listBudgetsTool,
  // Accounts
  listAccountsTool,
  // Categories
  listCategoriesTool,
  getCategoryTool,
  updateCategoryBudgetTool,
  updateCategoryTool,
  moveCategoryFundsTool,
  // Months
  getMonthSummaryTool,
  // Transactions
  listTransactionsTool,
  searchTransactionsTool,
  createTransactionTool,
  updateTransactionTool,
  getUnapprovedTransactionsTool,
  // Analytics
  categorySpendingSummaryTool,
  compareSpendingByYearTool,
  // Scheduled Transactions
  listScheduledTransactionsTool,
  createScheduledTransactionTool,
  deleteScheduledTransactionTool,
];

// Tool handler mapping; a Map so inherited object keys never resolve
const handlers = new Map<string, ToolHandler>([
  // Budgets
  ['list_budgets', handleListBudgets],
  // Accounts
  ['list_accounts', handleListAccounts],
  // Categories
  ['list_categories', handleListCategories],
  ['get_category', handleGetCategory],
  ['update_category_budget', handleUpdateCategoryBudget],
  ['update_category', handleUpdateCategory],
  ['move_category_funds', handleMoveCategoryFunds],
  // Months
  ['get_month_summary', handleGetMonthSummary],
  // Transactions
  ['list_transactions', handleListTransactions],
  ['search_transactions', handleSearchTransactions],
  ['create_transaction', handleCreateTransaction],
  ['update_transaction', handleUpdateTransaction],
  ['get_unapproved_transactions', handleGetUnapprovedTransactions],
  // Analytics
  ['get_category_spending_summary', handleCategorySpendingSummary],
  ['compare_spending_by_year', handleCompareSpendingByYear],
  // Scheduled Transactions
  ['list_scheduled_transactions', handleListScheduledTransactions],
  ['create_scheduled_transaction', handleCreateScheduledTransaction],
  ['delete_scheduled_transaction', handleDeleteScheduledTransaction],
]);

/**
 * Route a tool call to the appropriate handler. Never throws: failures,
 * including unknown tool names and invalid arguments, come back as
 * `{ ok: false, error }`.
 */
export async function handleToolCall(
  toolName: string,
  args: Record<string, unknown>,
  service: BudgetService,
  logger: Logger = silentLogger
): Promise<ToolResult> {
  return settle(
    async () => {
      const handler = handlers.get(toolName);
      if (handler === undefined) {
        throw new ValidationError(`Unknown tool: ${toolName}`, 'name');
      }
      logger.debug(`Calling tool ${toolName}`);
      return handler(args, service);
    },
    (error) => logger.error(`Tool ${toolName} failed`, error)
  );
}
