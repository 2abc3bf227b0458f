/**
 * YNAB Client Wrapper
 *
 * Owns the authenticated SDK session: one instance per process, built in
 * createServer() and handed to BudgetService. Methods map one-to-one onto
 * the remote endpoints the access layer uses and return the SDK's
 * responses untouched.
 */

import * as ynab from 'ynab';
import { MISSING_TOKEN_MESSAGE, ValidationError } from '../utils/errors.js';

export class YnabClient {
  private readonly api: ynab.API;

  /**
   * @throws ValidationError when the token is missing or empty, before
   *   the SDK is constructed
   */
  constructor(accessToken: string | undefined) {
    if (accessToken === undefined || accessToken.trim() === '') {
      throw new ValidationError(MISSING_TOKEN_MESSAGE, 'YNAB_ACCESS_TOKEN');
    }
    this.api = new ynab.API(accessToken);
  }

  // ==================== Budgets ====================

  async getBudgets(): Promise<ynab.BudgetSummaryResponse> {
    return this.api.budgets.getBudgets();
  }

  // ==================== Accounts ====================

  async getAccounts(budgetId: string): Promise<ynab.AccountsResponse> {
    return this.api.accounts.getAccounts(budgetId);
  }

  // ==================== Categories ====================

  async getCategories(budgetId: string): Promise<ynab.CategoriesResponse> {
    return this.api.categories.getCategories(budgetId);
  }

  async getCategoryById(budgetId: string, categoryId: string): Promise<ynab.CategoryResponse> {
    return this.api.categories.getCategoryById(budgetId, categoryId);
  }

  async updateMonthCategory(
    budgetId: string,
    month: string,
    categoryId: string,
    data: ynab.PatchMonthCategoryWrapper
  ): Promise<ynab.SaveCategoryResponse> {
    return this.api.categories.updateMonthCategory(budgetId, month, categoryId, data);
  }

  async updateCategory(
    budgetId: string,
    categoryId: string,
    data: ynab.PatchCategoryWrapper
  ): Promise<ynab.SaveCategoryResponse> {
    return this.api.categories.updateCategory(budgetId, categoryId, data);
  }

  // ==================== Months ====================

  async getBudgetMonth(budgetId: string, month: string): Promise<ynab.MonthDetailResponse> {
    return this.api.months.getBudgetMonth(budgetId, month);
  }

  // ==================== Transactions ====================

  async getTransactions(budgetId: string, sinceDate?: string): Promise<ynab.TransactionsResponse> {
    return this.api.transactions.getTransactions(budgetId, sinceDate);
  }

  async getAccountTransactions(
    budgetId: string,
    accountId: string,
    sinceDate?: string
  ): Promise<ynab.TransactionsResponse> {
    return this.api.transactions.getTransactionsByAccount(budgetId, accountId, sinceDate);
  }

  async getCategoryTransactions(
    budgetId: string,
    categoryId: string,
    sinceDate?: string
  ): Promise<ynab.HybridTransactionsResponse> {
    return this.api.transactions.getTransactionsByCategory(budgetId, categoryId, sinceDate);
  }

  async getTransactionById(
    budgetId: string,
    transactionId: string
  ): Promise<ynab.TransactionResponse> {
    return this.api.transactions.getTransactionById(budgetId, transactionId);
  }

  async createTransaction(
    budgetId: string,
    data: ynab.PostTransactionsWrapper
  ): Promise<ynab.SaveTransactionsResponse> {
    return this.api.transactions.createTransaction(budgetId, data);
  }

  async updateTransaction(
    budgetId: string,
    transactionId: string,
    data: ynab.PutTransactionWrapper
  ): Promise<ynab.TransactionResponse> {
    return this.api.transactions.updateTransaction(budgetId, transactionId, data);
  }

  // ==================== Scheduled Transactions ====================

  async getScheduledTransactions(budgetId: string): Promise<ynab.ScheduledTransactionsResponse> {
    return this.api.scheduledTransactions.getScheduledTransactions(budgetId);
  }

  async createScheduledTransaction(
    budgetId: string,
    data: ynab.PostScheduledTransactionWrapper
  ): Promise<ynab.ScheduledTransactionResponse> {
    return this.api.scheduledTransactions.createScheduledTransaction(budgetId, data);
  }

  async deleteScheduledTransaction(
    budgetId: string,
    scheduledTransactionId: string
  ): Promise<ynab.ScheduledTransactionResponse> {
    return this.api.scheduledTransactions.deleteScheduledTransaction(
      budgetId,
      scheduledTransactionId
    );
  }
}
