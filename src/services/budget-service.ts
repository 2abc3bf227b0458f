/**
 * Budget Service
 *
 * The access layer behind every tool: fetches through YnabClient, filters
 * and paginates locally, converts milliunits to decimals, and turns SDK
 * failures into the error taxonomy from utils/errors.
 *
 * Remote calls inside one operation are always issued one after another.
 * Nothing is cached between calls.
 */

import type * as ynab from 'ynab';
import type { YnabClient } from './ynab-client.js';
import {
  toAccount,
  toBudget,
  toCategory,
  toCategoryBalance,
  toScheduledTransaction,
  toTransaction,
  type WireCategory,
  type WireTransaction,
} from './normalize.js';
import {
  ApiError,
  BudgetToolError,
  NotFoundError,
  PartialUpdateError,
  ValidationError,
  translateRemoteError,
} from '../utils/errors.js';
import {
  averageToDecimal,
  percentChange,
  sumMilliunits,
  toDecimal,
  toMilliunits,
} from '../utils/milliunits.js';
import { paginate, resolvePage, resolvePageSize } from '../utils/pagination.js';
import { isValidIsoDate, isWithinRange, monthKey, monthsBetween, yearOf } from '../utils/dates.js';
import { renderBarChart } from '../utils/graph.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { ClearedStatus, FlagColor } from '../utils/transaction-constants.js';
import type {
  Account,
  Budget,
  Category,
  CategoryGroup,
  CategorySpendingSummary,
  FundsMove,
  MonthSummary,
  MonthlySpending,
  ScheduledTransaction,
  Transaction,
  TransactionPage,
  TransactionSearchResult,
  YearlySpending,
  YearlySpendingComparison,
} from '../types.js';

/** Budget id YNAB resolves to the user's most recently used budget. */
export const LAST_USED_BUDGET = 'last-used';

export const MAX_COMPARISON_YEARS = 20;

export interface BudgetServiceOptions {
  /** Budget used when a tool call omits budget_id. */
  defaultBudgetId?: string;
  logger?: Logger;
}

export interface ListTransactionsOptions {
  sinceDate?: string;
  untilDate?: string;
  accountId?: string;
  categoryId?: string;
  limit?: number;
  page?: number;
}

export interface SearchTransactionsOptions {
  sinceDate?: string;
  untilDate?: string;
  limit?: number;
}

export interface NewTransactionInput {
  accountId: string;
  date: string;
  amount: number;
  payeeId?: string;
  payeeName?: string;
  categoryId?: string;
  memo?: string;
  cleared?: ClearedStatus;
  approved?: boolean;
  flagColor?: FlagColor;
}

export interface TransactionChanges {
  accountId?: string;
  date?: string;
  amount?: number;
  payeeId?: string;
  payeeName?: string;
  categoryId?: string;
  memo?: string;
  cleared?: ClearedStatus;
  approved?: boolean;
  flagColor?: FlagColor;
}

export interface CategoryChanges {
  name?: string;
  note?: string;
  categoryGroupId?: string;
  goalTarget?: number;
}

export interface NewScheduledTransactionInput {
  accountId: string;
  date: string;
  amount: number;
  /** Forwarded unchecked; YNAB rejects unknown frequencies. */
  frequency: string;
  payeeId?: string;
  payeeName?: string;
  categoryId?: string;
  memo?: string;
  flagColor?: FlagColor;
}

function requireIsoDate(value: string, field: string): void {
  if (!isValidIsoDate(value)) {
    throw new ValidationError(`${field} must be a valid date in YYYY-MM-DD format, got "${value}"`, field);
  }
}

/** Milliunits spent: outflows count positive, refunds offset them. */
function spentMilliunits(transactions: WireTransaction[]): number {
  const net = sumMilliunits(transactions.map((t) => t.amount));
  return net === 0 ? 0 : -net;
}

export class BudgetService {
  private readonly client: YnabClient;
  private readonly defaultBudgetId: string;
  private readonly logger: Logger;

  constructor(client: YnabClient, options: BudgetServiceOptions = {}) {
    this.client = client;
    this.defaultBudgetId = options.defaultBudgetId ?? LAST_USED_BUDGET;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Resolve a budget ID, using the configured default if not provided.
   * Sentinels such as "last-used" are returned as-is for YNAB to resolve.
   */
  resolveBudgetId(budgetId?: string): string {
    return budgetId ?? this.defaultBudgetId;
  }

  /**
   * Run one operation, translating SDK failures into typed errors whose
   * message names the operation. Errors raised locally pass through.
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof BudgetToolError) throw error;
      throw translateRemoteError(operation, error);
    }
  }

  // ==================== Budgets & Accounts ====================

  async listBudgets(): Promise<Budget[]> {
    return this.run('get budgets', async () => {
      const response = await this.client.getBudgets();
      return response.data.budgets.map(toBudget);
    });
  }

  async listAccounts(budgetId: string): Promise<Account[]> {
    return this.run('get accounts', async () => {
      const response = await this.client.getAccounts(budgetId);
      return response.data.accounts.filter((a) => !a.deleted).map(toAccount);
    });
  }

  // ==================== Categories ====================

  /**
   * Category groups in remote order. Without `includeHidden`, hidden or
   * deleted categories are dropped, then hidden groups and groups left
   * with no categories.
   */
  async listCategories(budgetId: string, includeHidden = false): Promise<CategoryGroup[]> {
    return this.run('get categories', async () => {
      const response = await this.client.getCategories(budgetId);
      const groups: CategoryGroup[] = [];

      for (const group of response.data.category_groups) {
        if (group.deleted || (group.hidden && !includeHidden)) continue;

        const categories = group.categories.filter(
          (c) => includeHidden || (!c.hidden && !c.deleted)
        );
        if (categories.length === 0) continue;

        groups.push({
          id: group.id,
          name: group.name,
          hidden: group.hidden,
          categories: categories.map(toCategory),
        });
      }

      return groups;
    });
  }

  async getCategory(budgetId: string, categoryId: string): Promise<Category> {
    return this.run('get category', async () => {
      const response = await this.client.getCategoryById(budgetId, categoryId);
      return toCategory(response.data.category);
    });
  }

  /**
   * Month totals from the month endpoint, with group names looked up in
   * the general category listing.
   */
  async getMonthSummary(budgetId: string, month: string): Promise<MonthSummary> {
    requireIsoDate(month, 'month');

    return this.run('get budget summary', async () => {
      const monthResponse = await this.client.getBudgetMonth(budgetId, month);
      const categoriesResponse = await this.client.getCategories(budgetId);

      const groupNames = new Map<string, string>();
      for (const group of categoriesResponse.data.category_groups) {
        groupNames.set(group.id, group.name);
      }

      const detail = monthResponse.data.month;
      const categories: WireCategory[] = detail.categories;

      return {
        month: detail.month,
        income: toDecimal(detail.income),
        budgeted: toDecimal(sumMilliunits(categories.map((c) => c.budgeted))),
        activity: toDecimal(sumMilliunits(categories.map((c) => c.activity))),
        balance: toDecimal(sumMilliunits(categories.map((c) => c.balance))),
        to_be_budgeted: toDecimal(detail.to_be_budgeted),
        age_of_money: detail.age_of_money ?? null,
        categories: categories.map((c) => ({
          category_group: groupNames.get(c.category_group_id) ?? null,
          category_id: c.id,
          category_name: c.name,
          budgeted: toDecimal(c.budgeted),
          activity: toDecimal(c.activity),
          balance: toDecimal(c.balance),
        })),
      };
    });
  }

  /**
   * Set a category's budgeted amount for one month.
   */
  async updateCategoryBudget(
    budgetId: string,
    month: string,
    categoryId: string,
    budgeted: number
  ): Promise<Category> {
    requireIsoDate(month, 'month');

    return this.run('update category budget', async () => {
      const response = await this.client.updateMonthCategory(budgetId, month, categoryId, {
        category: { budgeted: toMilliunits(budgeted) },
      });
      this.logger.info(`Updated budgeted amount of category ${categoryId} for ${month}`);
      return toCategory(response.data.category);
    });
  }

  /**
   * Patch a category's name, note, group or goal target. Only the given
   * fields are sent. YNAB ignores goal_target for categories without a goal.
   */
  async updateCategory(
    budgetId: string,
    categoryId: string,
    changes: CategoryChanges
  ): Promise<Category> {
    const patch: ynab.PatchCategoryWrapper['category'] = {};
    if (changes.name !== undefined) patch.name = changes.name;
    if (changes.note !== undefined) patch.note = changes.note;
    if (changes.categoryGroupId !== undefined) patch.category_group_id = changes.categoryGroupId;
    if (changes.goalTarget !== undefined) patch.goal_target = toMilliunits(changes.goalTarget);

    if (Object.keys(patch).length === 0) {
      throw new ValidationError(
        'At least one of name, note, category_group_id or goal_target must be provided'
      );
    }

    return this.run('update category', async () => {
      const response = await this.client.updateCategory(budgetId, categoryId, { category: patch });
      this.logger.info(`Updated category ${categoryId} (${Object.keys(patch).join(', ')})`);
      return toCategory(response.data.category);
    });
  }

  /**
   * Move budgeted money between two categories in one month.
   *
   * Both current amounts come from a single month read; the source is
   * written first, then the destination. The two writes are not atomic:
   * if the second fails, the first stays applied and a PartialUpdateError
   * reports it. Amount sign and available balance are not checked.
   */
  async moveCategoryFunds(
    budgetId: string,
    month: string,
    fromCategoryId: string,
    toCategoryId: string,
    amount: number
  ): Promise<FundsMove> {
    requireIsoDate(month, 'month');
    if (fromCategoryId === toCategoryId) {
      throw new ValidationError('Source and destination categories must differ', 'to_category_id');
    }

    return this.run('move category funds', async () => {
      const monthResponse = await this.client.getBudgetMonth(budgetId, month);
      const categories: WireCategory[] = monthResponse.data.month.categories;
      const source = categories.find((c) => c.id === fromCategoryId);
      const destination = categories.find((c) => c.id === toCategoryId);

      if (source === undefined || destination === undefined) {
        const missing = [fromCategoryId, toCategoryId].filter(
          (id) => !categories.some((c) => c.id === id)
        );
        throw new NotFoundError('Category', missing.join(', '));
      }

      const sourceBudgeted = toMilliunits(toDecimal(source.budgeted) - amount);
      const destinationBudgeted = toMilliunits(toDecimal(destination.budgeted) + amount);

      const fromResponse = await this.client.updateMonthCategory(budgetId, month, fromCategoryId, {
        category: { budgeted: sourceBudgeted },
      });

      let toResponse: ynab.SaveCategoryResponse;
      try {
        toResponse = await this.client.updateMonthCategory(budgetId, month, toCategoryId, {
          category: { budgeted: destinationBudgeted },
        });
      } catch (error) {
        const cause = translateRemoteError('update destination category', error);
        this.logger.error(
          `Funds move left partially applied: category ${fromCategoryId} updated, ${toCategoryId} not`,
          cause
        );
        throw new PartialUpdateError(
          `Failed to move category funds: source category ${fromCategoryId} was set to ` +
            `${toDecimal(sourceBudgeted)} but the destination update failed (${cause.message})`,
          [{ category_id: fromCategoryId, budgeted: toDecimal(sourceBudgeted) }],
          cause
        );
      }

      this.logger.info(`Moved ${amount} from category ${fromCategoryId} to ${toCategoryId} for ${month}`);

      return {
        month,
        from_category: toCategoryBalance(fromResponse.data.category),
        to_category: toCategoryBalance(toResponse.data.category),
        amount_moved: amount,
      };
    });
  }

  // ==================== Transactions ====================

  /**
   * List transactions, paginated locally.
   *
   * With `accountId` the account endpoint is used, otherwise the budget-wide
   * one; `sinceDate` goes to YNAB, while `untilDate` and `categoryId` are
   * applied after the fetch since neither endpoint supports them.
   */
  async listTransactions(
    budgetId: string,
    options: ListTransactionsOptions = {}
  ): Promise<TransactionPage> {
    const perPage = resolvePageSize(options.limit);
    const page = resolvePage(options.page);
    if (options.sinceDate !== undefined) requireIsoDate(options.sinceDate, 'since_date');
    if (options.untilDate !== undefined) requireIsoDate(options.untilDate, 'until_date');

    return this.run('get transactions', async () => {
      const response =
        options.accountId !== undefined
          ? await this.client.getAccountTransactions(budgetId, options.accountId, options.sinceDate)
          : await this.client.getTransactions(budgetId, options.sinceDate);

      const filtered = response.data.transactions.filter(
        (t) =>
          isWithinRange(t.date, options.sinceDate, options.untilDate) &&
          (options.categoryId === undefined || t.category_id === options.categoryId)
      );

      const { items, pagination } = paginate(filtered, perPage, page);
      return { transactions: items.map(toTransaction), pagination };
    });
  }

  /**
   * Case-insensitive substring search over payee name and memo.
   * Transactions with neither field never match.
   */
  async searchTransactions(
    budgetId: string,
    searchTerm: string,
    options: SearchTransactionsOptions = {}
  ): Promise<TransactionSearchResult> {
    if (searchTerm.trim() === '') {
      throw new ValidationError('search_term must not be empty', 'search_term');
    }
    const limit = resolvePageSize(options.limit);
    if (options.sinceDate !== undefined) requireIsoDate(options.sinceDate, 'since_date');
    if (options.untilDate !== undefined) requireIsoDate(options.untilDate, 'until_date');

    // Matched as given, surrounding spaces included
    const needle = searchTerm.toLowerCase();
    const contains = (value: string | null | undefined): boolean =>
      typeof value === 'string' && value.toLowerCase().includes(needle);

    return this.run('search transactions', async () => {
      const response = await this.client.getTransactions(budgetId, options.sinceDate);
      const matches = response.data.transactions
        .filter((t) => isWithinRange(t.date, options.sinceDate, options.untilDate))
        .filter((t) => contains(t.payee_name) || contains(t.memo))
        .slice(0, limit)
        .map(toTransaction);

      return { transactions: matches, count: matches.length };
    });
  }

  async createTransaction(budgetId: string, input: NewTransactionInput): Promise<Transaction> {
    requireIsoDate(input.date, 'date');

    const transaction: ynab.NewTransaction = {
      account_id: input.accountId,
      date: input.date,
      amount: toMilliunits(input.amount),
      cleared: (input.cleared ?? 'uncleared') as ynab.TransactionClearedStatus,
      approved: input.approved ?? false,
    };
    if (input.payeeId !== undefined) transaction.payee_id = input.payeeId;
    if (input.payeeName !== undefined) transaction.payee_name = input.payeeName;
    if (input.categoryId !== undefined) transaction.category_id = input.categoryId;
    if (input.memo !== undefined) transaction.memo = input.memo;
    if (input.flagColor !== undefined)
      transaction.flag_color = input.flagColor as ynab.TransactionFlagColor;

    return this.run('create transaction', async () => {
      const response = await this.client.createTransaction(budgetId, { transaction });
      const created = response.data.transaction;
      if (created == null) {
        throw new ApiError('Failed to create transaction: no transaction returned', null);
      }
      this.logger.info(`Created transaction ${created.id} in account ${input.accountId}`);
      return toTransaction(created);
    });
  }

  /**
   * Update a transaction. YNAB's PUT needs the whole record, so the current
   * transaction is read first and every field not in `changes` keeps its
   * existing value.
   */
  async updateTransaction(
    budgetId: string,
    transactionId: string,
    changes: TransactionChanges
  ): Promise<Transaction> {
    if (changes.date !== undefined) requireIsoDate(changes.date, 'date');

    return this.run('update transaction', async () => {
      const existingResponse = await this.client.getTransactionById(budgetId, transactionId);
      const existing = existingResponse.data.transaction;

      // A new payee name replaces the payee reference; YNAB resolves it
      const payeeId =
        changes.payeeId ?? (changes.payeeName !== undefined ? null : existing.payee_id ?? null);

      const transaction: ynab.PutTransactionWrapper['transaction'] = {
        account_id: changes.accountId ?? existing.account_id,
        date: changes.date ?? existing.date,
        amount: changes.amount !== undefined ? toMilliunits(changes.amount) : existing.amount,
        payee_id: payeeId,
        payee_name: changes.payeeName ?? existing.payee_name ?? null,
        category_id: changes.categoryId ?? existing.category_id ?? null,
        memo: changes.memo ?? existing.memo ?? null,
        cleared:
          changes.cleared !== undefined
            ? (changes.cleared as ynab.TransactionClearedStatus)
            : existing.cleared,
        approved: changes.approved ?? existing.approved,
        flag_color:
          changes.flagColor !== undefined
            ? (changes.flagColor as ynab.TransactionFlagColor)
            : existing.flag_color ?? null,
      };

      const response = await this.client.updateTransaction(budgetId, transactionId, {
        transaction,
      });
      this.logger.info(`Updated transaction ${transactionId}`);
      return toTransaction(response.data.transaction);
    });
  }

  /**
   * Unapproved, non-deleted transactions. YNAB has no server-side filter
   * for this on the plain listing, so it is applied here.
   */
  async getUnapprovedTransactions(budgetId: string): Promise<Transaction[]> {
    return this.run('get unapproved transactions', async () => {
      const response = await this.client.getTransactions(budgetId);
      return response.data.transactions
        .filter((t) => !t.approved && !t.deleted)
        .map(toTransaction);
    });
  }

  // ==================== Spending Analysis ====================

  /**
   * Spending in one category between two dates, broken down by calendar
   * month. Every month in the range is listed, including empty ones, and
   * the average divides by that month count.
   */
  async getCategorySpendingSummary(
    budgetId: string,
    categoryId: string,
    sinceDate: string,
    untilDate: string,
    includeGraph = true
  ): Promise<CategorySpendingSummary> {
    requireIsoDate(sinceDate, 'since_date');
    requireIsoDate(untilDate, 'until_date');
    if (sinceDate > untilDate) {
      throw new ValidationError('since_date must not be after until_date', 'since_date');
    }

    return this.run('get category spending summary', async () => {
      const response = await this.client.getCategoryTransactions(budgetId, categoryId, sinceDate);
      const transactions: WireTransaction[] = response.data.transactions.filter(
        (t) => !t.deleted && isWithinRange(t.date, sinceDate, untilDate)
      );

      const months = monthsBetween(sinceDate, untilDate);
      const monthly = months.map((month) => {
        const inMonth = transactions.filter((t) => monthKey(t.date) === month);
        return { month, spent: spentMilliunits(inMonth), count: inMonth.length };
      });
      const breakdown: MonthlySpending[] = monthly.map((m) => ({
        month: m.month,
        spent: toDecimal(m.spent),
        transaction_count: m.count,
      }));

      const total = spentMilliunits(transactions);
      const summary: CategorySpendingSummary = {
        category_id: categoryId,
        category_name: transactions[0]?.category_name ?? null,
        since_date: sinceDate,
        until_date: untilDate,
        total_spent: toDecimal(total),
        average_per_month: averageToDecimal(total, months.length),
        transaction_count: transactions.length,
        monthly_breakdown: breakdown,
      };

      if (includeGraph) {
        summary.graph = renderBarChart(
          `Monthly spending: ${summary.category_name ?? categoryId}`,
          monthly.map((m) => ({ label: m.month, value: m.spent }))
        );
      }

      return summary;
    });
  }

  /**
   * Yearly spending in one category for `numYears` consecutive years from
   * `startYear`, each compared with the year before it.
   */
  async compareSpendingByYear(
    budgetId: string,
    categoryId: string,
    startYear: number,
    numYears = 5,
    includeGraph = true
  ): Promise<YearlySpendingComparison> {
    if (!Number.isInteger(startYear) || startYear < 1900 || startYear > 9999) {
      throw new ValidationError(`start_year must be a four-digit year, got ${startYear}`, 'start_year');
    }
    if (!Number.isInteger(numYears) || numYears < 1 || numYears > MAX_COMPARISON_YEARS) {
      throw new ValidationError(
        `num_years must be an integer between 1 and ${MAX_COMPARISON_YEARS}, got ${numYears}`,
        'num_years'
      );
    }

    const endYear = startYear + numYears - 1;

    return this.run('compare spending by year', async () => {
      const response = await this.client.getCategoryTransactions(
        budgetId,
        categoryId,
        `${startYear}-01-01`
      );
      const transactions: WireTransaction[] = response.data.transactions.filter(
        (t) => !t.deleted && yearOf(t.date) >= startYear && yearOf(t.date) <= endYear
      );

      const years: YearlySpending[] = [];
      const totals: number[] = [];
      for (let year = startYear; year <= endYear; year++) {
        const inYear = transactions.filter((t) => yearOf(t.date) === year);
        const spent = spentMilliunits(inYear);
        const previous = totals[totals.length - 1];
        years.push({
          year,
          total_spent: toDecimal(spent),
          transaction_count: inYear.length,
          change: previous === undefined ? null : toDecimal(spent - previous),
          percent_change: previous === undefined ? null : percentChange(previous, spent),
        });
        totals.push(spent);
      }

      const comparison: YearlySpendingComparison = {
        category_id: categoryId,
        category_name: transactions[0]?.category_name ?? null,
        start_year: startYear,
        num_years: numYears,
        years,
      };

      if (includeGraph) {
        comparison.graph = renderBarChart(
          `Yearly spending: ${comparison.category_name ?? categoryId}`,
          years.map((y, i) => ({ label: String(y.year), value: totals[i] ?? 0 }))
        );
      }

      return comparison;
    });
  }

  // ==================== Scheduled Transactions ====================

  async listScheduledTransactions(budgetId: string): Promise<ScheduledTransaction[]> {
    return this.run('get scheduled transactions', async () => {
      const response = await this.client.getScheduledTransactions(budgetId);
      return response.data.scheduled_transactions
        .filter((t) => !t.deleted)
        .map(toScheduledTransaction);
    });
  }

  async createScheduledTransaction(
    budgetId: string,
    input: NewScheduledTransactionInput
  ): Promise<ScheduledTransaction> {
    requireIsoDate(input.date, 'date');

    const scheduled: ynab.SaveScheduledTransaction = {
      account_id: input.accountId,
      date: input.date,
      amount: toMilliunits(input.amount),
      frequency: input.frequency as ynab.ScheduledTransactionFrequency,
    };
    if (input.payeeId !== undefined) scheduled.payee_id = input.payeeId;
    if (input.payeeName !== undefined) scheduled.payee_name = input.payeeName;
    if (input.categoryId !== undefined) scheduled.category_id = input.categoryId;
    if (input.memo !== undefined) scheduled.memo = input.memo;
    if (input.flagColor !== undefined)
      scheduled.flag_color = input.flagColor as ynab.TransactionFlagColor;

    return this.run('create scheduled transaction', async () => {
      const response = await this.client.createScheduledTransaction(budgetId, {
        scheduled_transaction: scheduled,
      });
      const created = response.data.scheduled_transaction;
      this.logger.info(`Created scheduled transaction ${created.id} (${created.frequency})`);
      return toScheduledTransaction(created);
    });
  }

  async deleteScheduledTransaction(
    budgetId: string,
    scheduledTransactionId: string
  ): Promise<ScheduledTransaction> {
    return this.run('delete scheduled transaction', async () => {
      const response = await this.client.deleteScheduledTransaction(
        budgetId,
        scheduledTransactionId
      );
      this.logger.info(`Deleted scheduled transaction ${scheduledTransactionId}`);
      return toScheduledTransaction(response.data.scheduled_transaction);
    });
  }
}
