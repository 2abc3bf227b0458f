/**
 * Tool Registry Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { BudgetService } from '../../../src/services/budget-service.js';
import { tools, handleToolCall } from '../../../src/tools/index.js';
import {
  createMockClient,
  createTestService,
  createAccountsResponse,
  createMonthResponse,
  createTransaction,
  createTransactionsResponse,
  createTransactionResponse,
  type MockClient,
} from '../fixtures/index.js';

describe('tools', () => {
  it('registers every tool once, without a vendor prefix', () => {
    const names = tools.map((t) => t.name);

    expect([...names].sort()).toEqual([
      'compare_spending_by_year',
      'create_scheduled_transaction',
      'create_transaction',
      'delete_scheduled_transaction',
      'get_category',
      'get_category_spending_summary',
      'get_month_summary',
      'get_unapproved_transactions',
      'list_accounts',
      'list_budgets',
      'list_categories',
      'list_scheduled_transactions',
      'list_transactions',
      'move_category_funds',
      'search_transactions',
      'update_category',
      'update_category_budget',
      'update_transaction',
    ]);
    expect(new Set(names).size).toBe(names.length);
  });

  it('declares every required argument as a property', () => {
    for (const tool of tools) {
      const properties = Object.keys(tool.inputSchema.properties ?? {});
      for (const field of tool.inputSchema.required ?? []) {
        expect(properties).toContain(field);
      }
    }
  });
});

describe('handleToolCall', () => {
  let client: MockClient;
  let service: BudgetService;

  beforeEach(() => {
    client = createMockClient();
    service = createTestService(client);
  });

  it('returns data for a successful call, using the default budget', async () => {
    client.getAccounts.mockResolvedValue(createAccountsResponse());

    const result = await handleToolCall('list_accounts', {}, service);

    expect(client.getAccounts).toHaveBeenCalledWith('test-budget-id');
    expect(result.ok).toBe(true);
    expect(result.ok && Array.isArray(result.data) && result.data.length).toBe(3);
  });

  it('passes an explicit budget id through unchanged', async () => {
    client.getAccounts.mockResolvedValue(createAccountsResponse([]));

    await handleToolCall('list_accounts', { budget_id: 'last-used' }, service);

    expect(client.getAccounts).toHaveBeenCalledWith('last-used');
  });

  it('reports an unknown tool', async () => {
    const result = await handleToolCall('ynab_list_budgets', {}, service);

    expect(result).toEqual({
      ok: false,
      error: {
        error: true,
        type: 'validation_error',
        message: 'Unknown tool: ynab_list_budgets',
        field: 'name',
        suggestion: 'Check that all input parameters are valid.',
      },
    });
  });

  it.each(['constructor', 'toString', 'hasOwnProperty', '__proto__'])(
    'treats the object key %s as an unknown tool',
    async (name) => {
      const result = await handleToolCall(name, { secret: 1 }, service);

      expect(result).toEqual({
        ok: false,
        error: {
          error: true,
          type: 'validation_error',
          message: `Unknown tool: ${name}`,
          field: 'name',
          suggestion: 'Check that all input parameters are valid.',
        },
      });
    }
  );

  it('rejects invalid arguments before calling YNAB', async () => {
    const result = await handleToolCall('list_transactions', { limit: 501 }, service);

    expect(result).toMatchObject({
      ok: false,
      error: {
        type: 'validation_error',
        message: 'Invalid input parameters',
        issues: [{ field: 'limit' }],
      },
    });
    expect(client.getTransactions).not.toHaveBeenCalled();
  });

  it('requires a first-of-month month', async () => {
    const result = await handleToolCall('get_month_summary', { month: '2024-03-15' }, service);

    expect(result).toMatchObject({ ok: false, error: { issues: [{ field: 'month' }] } });
    expect(client.getBudgetMonth).not.toHaveBeenCalled();
  });

  it('surfaces throttling as a rate_limit error and logs it', async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    client.getBudgets.mockRejectedValue({
      error: { id: '429', name: 'too_many_requests', detail: 'Too many requests' },
    });

    const result = await handleToolCall('list_budgets', {}, service, logger);

    expect(result).toMatchObject({
      ok: false,
      error: { type: 'rate_limit', message: 'Failed to get budgets: Too many requests' },
    });
    expect(logger.error).toHaveBeenCalledWith('Tool list_budgets failed', expect.anything());
  });

  it('strips control characters from free text before sending it', async () => {
    client.createTransaction.mockResolvedValue(createTransactionResponse());

    await handleToolCall(
      'create_transaction',
      {
        account_id: 'acct-checking',
        date: '2024-03-05',
        amount: -12.5,
        memo: ' Lunch\u0000\u200B ',
        cleared: 'cleared',
      },
      service
    );

    expect(client.createTransaction).toHaveBeenCalledWith('test-budget-id', {
      transaction: {
        account_id: 'acct-checking',
        date: '2024-03-05',
        amount: -12500,
        cleared: 'cleared',
        approved: false,
        memo: 'Lunch',
      },
    });
  });

  it('rejects an unknown cleared status', async () => {
    const result = await handleToolCall(
      'create_transaction',
      { account_id: 'acct-checking', date: '2024-03-05', amount: -1, cleared: 'pending' },
      service
    );

    expect(result).toMatchObject({ ok: false, error: { issues: [{ field: 'cleared' }] } });
    expect(client.createTransaction).not.toHaveBeenCalled();
  });

  it('passes the search term through untrimmed', async () => {
    client.getTransactions.mockResolvedValue(
      createTransactionsResponse([
        createTransaction({ id: 'ends', date: '2024-01-01', amount: -1000, memo: 'Corner cafe' }),
        createTransaction({ id: 'inner', date: '2024-01-02', amount: -2000, memo: 'Cafe latte' }),
      ])
    );

    const result = await handleToolCall('search_transactions', { search_term: 'cafe ' }, service);

    expect(result).toMatchObject({ ok: true, data: { transactions: [{ id: 'inner' }], count: 1 } });
  });

  it('rejects a blank search term', async () => {
    const result = await handleToolCall('search_transactions', { search_term: '  ' }, service);

    expect(result).toMatchObject({
      ok: false,
      error: {
        type: 'validation_error',
        issues: [{ field: 'search_term', message: 'search_term must not be empty' }],
      },
    });
    expect(client.getTransactions).not.toHaveBeenCalled();
  });

  it('applies analysis defaults', async () => {
    client.getCategoryTransactions.mockResolvedValue(createTransactionsResponse([]));

    const result = await handleToolCall(
      'compare_spending_by_year',
      { category_id: 'cat-dining', start_year: 2020 },
      service
    );

    expect(client.getCategoryTransactions).toHaveBeenCalledWith(
      'test-budget-id',
      'cat-dining',
      '2020-01-01'
    );
    expect(result).toMatchObject({
      ok: true,
      data: { num_years: 5, graph: expect.stringContaining('Yearly spending: cat-dining') },
    });
  });

  it('maps transaction filters onto the service options', async () => {
    client.getTransactions.mockResolvedValue(createTransactionsResponse());

    const result = await handleToolCall(
      'list_transactions',
      { since_date: '2024-02-01', category_id: 'cat-dining', limit: 10 },
      service
    );

    expect(client.getTransactions).toHaveBeenCalledWith('test-budget-id', '2024-02-01');
    expect(result).toMatchObject({
      ok: true,
      data: {
        transactions: [{ id: 'txn-4' }, { id: 'txn-5' }],
        pagination: { per_page: 10, total_count: 2 },
      },
    });
  });

  it('moves funds between categories', async () => {
    client.getBudgetMonth.mockResolvedValue(createMonthResponse());
    client.updateMonthCategory.mockRejectedValue(new TypeError('fetch failed'));

    const result = await handleToolCall(
      'move_category_funds',
      {
        month: '2024-03-01',
        from_category_id: 'cat-groceries',
        to_category_id: 'cat-dining',
        amount: 25,
      },
      service
    );

    // First write fails, so nothing was applied
    expect(result).toMatchObject({
      ok: false,
      error: { type: 'connection_error', message: 'Failed to move category funds: fetch failed' },
    });
    expect(client.updateMonthCategory).toHaveBeenCalledTimes(1);
  });
});
