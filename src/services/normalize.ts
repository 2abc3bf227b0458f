/**
 * Wire → tool shape mapping.
 *
 * The Wire* interfaces name exactly the fields read from YNAB responses.
 * The SDK's own models satisfy them structurally, so a renamed or retyped
 * field fails to compile here instead of leaking `undefined` downstream.
 */

import { toDecimal } from '../utils/milliunits.js';
import type {
  Account,
  Budget,
  Category,
  CategoryBalance,
  ScheduledTransaction,
  Transaction,
} from '../types.js';

export interface WireBudget {
  id: string;
  name: string;
  last_modified_on?: string | null;
  currency_format?: {
    iso_code: string;
    example_format: string;
    currency_symbol: string;
  } | null;
}

export interface WireAccount {
  id: string;
  name: string;
  type: string;
  on_budget: boolean;
  closed: boolean;
  balance: number;
  deleted: boolean;
}

export interface WireCategory {
  id: string;
  name: string;
  category_group_id: string;
  hidden: boolean;
  deleted: boolean;
  note?: string | null;
  budgeted: number;
  activity: number;
  balance: number;
  goal_type?: string | null;
  goal_target?: number | null;
  goal_target_month?: string | null;
  goal_percentage_complete?: number | null;
  goal_under_funded?: number | null;
}

export interface WireCategoryGroup {
  id: string;
  name: string;
  hidden: boolean;
  deleted: boolean;
  categories: WireCategory[];
}

export interface WireTransaction {
  id: string;
  date: string;
  amount: number;
  memo?: string | null;
  cleared: string;
  approved: boolean;
  flag_color?: string | null;
  account_id: string;
  account_name: string;
  payee_id?: string | null;
  payee_name?: string | null;
  category_id?: string | null;
  category_name?: string | null;
  transfer_account_id?: string | null;
  deleted: boolean;
}

export interface WireScheduledTransaction {
  id: string;
  date_first: string;
  date_next: string;
  frequency: string;
  amount: number;
  memo?: string | null;
  flag_color?: string | null;
  account_id: string;
  account_name: string;
  payee_id?: string | null;
  payee_name?: string | null;
  category_id?: string | null;
  category_name?: string | null;
  deleted: boolean;
}

function optionalDecimal(milliunits: number | null | undefined): number | null {
  return milliunits === null || milliunits === undefined ? null : toDecimal(milliunits);
}

export function toBudget(budget: WireBudget): Budget {
  const format = budget.currency_format;
  return {
    id: budget.id,
    name: budget.name,
    last_modified_on: budget.last_modified_on ?? null,
    currency_format: format
      ? {
          iso_code: format.iso_code,
          example_format: format.example_format,
          currency_symbol: format.currency_symbol,
        }
      : null,
  };
}

export function toAccount(account: WireAccount): Account {
  return {
    id: account.id,
    name: account.name,
    type: account.type,
    on_budget: account.on_budget,
    closed: account.closed,
    balance: toDecimal(account.balance),
  };
}

export function toCategory(category: WireCategory): Category {
  const result: Category = {
    id: category.id,
    name: category.name,
    category_group_id: category.category_group_id,
    hidden: category.hidden,
    note: category.note ?? null,
    budgeted: toDecimal(category.budgeted),
    activity: toDecimal(category.activity),
    balance: toDecimal(category.balance),
  };

  if (category.goal_type !== null && category.goal_type !== undefined) {
    result.goal_type = category.goal_type;
    result.goal_target = optionalDecimal(category.goal_target);
    result.goal_target_month = category.goal_target_month ?? null;
    result.goal_percentage_complete = category.goal_percentage_complete ?? null;
    result.goal_under_funded = optionalDecimal(category.goal_under_funded);
  }

  return result;
}

export function toCategoryBalance(category: WireCategory): CategoryBalance {
  return {
    id: category.id,
    name: category.name,
    budgeted: toDecimal(category.budgeted),
    balance: toDecimal(category.balance),
  };
}

export function toTransaction(txn: WireTransaction): Transaction {
  return {
    id: txn.id,
    date: txn.date,
    amount: toDecimal(txn.amount),
    memo: txn.memo ?? null,
    cleared: txn.cleared,
    approved: txn.approved,
    flag_color: txn.flag_color ?? null,
    account_id: txn.account_id,
    account_name: txn.account_name,
    payee_id: txn.payee_id ?? null,
    payee_name: txn.payee_name ?? null,
    category_id: txn.category_id ?? null,
    category_name: txn.category_name ?? null,
    transfer_account_id: txn.transfer_account_id ?? null,
    deleted: txn.deleted,
  };
}

export function toScheduledTransaction(txn: WireScheduledTransaction): ScheduledTransaction {
  return {
    id: txn.id,
    date_first: txn.date_first,
    date_next: txn.date_next,
    frequency: txn.frequency,
    amount: toDecimal(txn.amount),
    memo: txn.memo ?? null,
    flag_color: txn.flag_color ?? null,
    account_id: txn.account_id,
    account_name: txn.account_name,
    payee_id: txn.payee_id ?? null,
    payee_name: txn.payee_name ?? null,
    category_id: txn.category_id ?? null,
    category_name: txn.category_name ?? null,
  };
}
