/**
 * Tool-facing data shapes.
 *
 * Every monetary field is a decimal amount in the budget's currency
 * (milliunits / 1000). Positive amounts are inflows, negative outflows.
 */

import type { PaginationMeta } from './utils/pagination.js';

export interface CurrencySummary {
  iso_code: string;
  example_format: string;
  currency_symbol: string;
}

export interface Budget {
  id: string;
  name: string;
  last_modified_on: string | null;
  currency_format: CurrencySummary | null;
}

export interface Account {
  id: string;
  name: string;
  type: string;
  on_budget: boolean;
  closed: boolean;
  balance: number;
}

export interface Category {
  id: string;
  name: string;
  category_group_id: string;
  hidden: boolean;
  note: string | null;
  budgeted: number;
  activity: number;
  balance: number;
  // Goal fields are present only when the category has a goal
  goal_type?: string;
  goal_target?: number | null;
  goal_target_month?: string | null;
  goal_percentage_complete?: number | null;
  goal_under_funded?: number | null;
}

export interface CategoryGroup {
  id: string;
  name: string;
  hidden: boolean;
  categories: Category[];
}

export interface Transaction {
  id: string;
  date: string;
  amount: number;
  memo: string | null;
  cleared: string;
  approved: boolean;
  flag_color: string | null;
  account_id: string;
  account_name: string;
  payee_id: string | null;
  payee_name: string | null;
  category_id: string | null;
  category_name: string | null;
  transfer_account_id: string | null;
  deleted: boolean;
}

export interface ScheduledTransaction {
  id: string;
  date_first: string;
  date_next: string;
  frequency: string;
  amount: number;
  memo: string | null;
  flag_color: string | null;
  account_id: string;
  account_name: string;
  payee_id: string | null;
  payee_name: string | null;
  category_id: string | null;
  category_name: string | null;
}

export interface MonthCategoryLine {
  category_group: string | null;
  category_id: string;
  category_name: string;
  budgeted: number;
  activity: number;
  balance: number;
}

export interface MonthSummary {
  month: string;
  income: number;
  budgeted: number;
  activity: number;
  balance: number;
  to_be_budgeted: number;
  age_of_money: number | null;
  categories: MonthCategoryLine[];
}

export interface TransactionPage {
  transactions: Transaction[];
  pagination: PaginationMeta;
}

export interface TransactionSearchResult {
  transactions: Transaction[];
  count: number;
}

export interface MonthlySpending {
  month: string;
  spent: number;
  transaction_count: number;
}

export interface CategorySpendingSummary {
  category_id: string;
  category_name: string | null;
  since_date: string;
  until_date: string;
  total_spent: number;
  average_per_month: number;
  transaction_count: number;
  monthly_breakdown: MonthlySpending[];
  graph?: string;
}

export interface YearlySpending {
  year: number;
  total_spent: number;
  transaction_count: number;
  /** Absolute change versus the prior year; null for the first year */
  change: number | null;
  /** Percentage change versus the prior year; null when there is no non-zero base */
  percent_change: number | null;
}

export interface YearlySpendingComparison {
  category_id: string;
  category_name: string | null;
  start_year: number;
  num_years: number;
  years: YearlySpending[];
  graph?: string;
}

export interface CategoryBalance {
  id: string;
  name: string;
  budgeted: number;
  balance: number;
}

export interface FundsMove {
  month: string;
  from_category: CategoryBalance;
  to_category: CategoryBalance;
  amount_moved: number;
}
