/**
 * BudgetService Tests: spending analysis
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { BudgetService } from '../../../src/services/budget-service.js';
import { ValidationError } from '../../../src/utils/errors.js';
import {
  createMockClient,
  createTestService,
  createTransaction,
  createTransactionsResponse,
  mockRefund,
  mockTraderJoes,
  mockWholeFoods,
  type MockClient,
} from '../fixtures/index.js';

const BUDGET = 'test-budget-id';
const bars = (n: number): string => '█'.repeat(n);

function dining(id: string, date: string, amount: number, deleted = false) {
  return createTransaction({
    id,
    date,
    amount,
    category_id: 'cat-dining',
    category_name: 'Dining Out',
    deleted,
  });
}

describe('BudgetService spending analysis', () => {
  let client: MockClient;
  let service: BudgetService;

  beforeEach(() => {
    client = createMockClient();
    service = createTestService(client);
  });

  describe('getCategorySpendingSummary', () => {
    beforeEach(() => {
      client.getCategoryTransactions.mockResolvedValue(
        createTransactionsResponse([
          mockWholeFoods,
          mockTraderJoes,
          mockRefund,
          createTransaction({
            id: 'txn-april',
            date: '2024-04-02',
            amount: -9990,
            category_id: 'cat-groceries',
            category_name: 'Groceries',
          }),
          createTransaction({
            id: 'txn-gone',
            date: '2024-03-10',
            amount: -5000,
            category_id: 'cat-groceries',
            category_name: 'Groceries',
            deleted: true,
          }),
        ])
      );
    });

    it('totals spending with refunds offsetting outflows', async () => {
      const summary = await service.getCategorySpendingSummary(
        BUDGET,
        'cat-groceries',
        '2024-01-01',
        '2024-03-31',
        false
      );

      expect(client.getCategoryTransactions).toHaveBeenCalledWith(BUDGET, 'cat-groceries', '2024-01-01');
      expect(summary).toEqual({
        category_id: 'cat-groceries',
        category_name: 'Groceries',
        since_date: '2024-01-01',
        until_date: '2024-03-31',
        total_spent: 57.12,
        average_per_month: 19.04,
        transaction_count: 3,
        monthly_breakdown: [
          { month: '2024-01', spent: 69.12, transaction_count: 2 },
          { month: '2024-02', spent: -12, transaction_count: 1 },
          { month: '2024-03', spent: 0, transaction_count: 0 },
        ],
      });
    });

    it('renders a bar per month', async () => {
      const summary = await service.getCategorySpendingSummary(
        BUDGET,
        'cat-groceries',
        '2024-01-01',
        '2024-03-31'
      );

      expect(summary.graph?.split('\n')).toEqual([
        'Monthly spending: Groceries',
        `2024-01 | ${bars(40)} $69.12`,
        `2024-02 | ${bars(7)} -$12.00`,
        '2024-03 | $0.00',
      ]);
    });

    it('falls back to the category id when nothing was spent', async () => {
      client.getCategoryTransactions.mockResolvedValue(createTransactionsResponse([]));

      const summary = await service.getCategorySpendingSummary(
        BUDGET,
        'cat-empty',
        '2024-01-15',
        '2024-02-15'
      );

      expect(summary.category_name).toBeNull();
      expect(summary.total_spent).toBe(0);
      expect(summary.average_per_month).toBe(0);
      expect(summary.graph?.split('\n')).toEqual([
        'Monthly spending: cat-empty',
        '2024-01 | $0.00',
        '2024-02 | $0.00',
      ]);
    });

    it('rejects a reversed range', async () => {
      await expect(
        service.getCategorySpendingSummary(BUDGET, 'cat-groceries', '2024-03-01', '2024-01-01')
      ).rejects.toMatchObject({ type: 'validation_error', field: 'since_date' });
      expect(client.getCategoryTransactions).not.toHaveBeenCalled();
    });
  });

  describe('compareSpendingByYear', () => {
    beforeEach(() => {
      client.getCategoryTransactions.mockResolvedValue(
        createTransactionsResponse([
          dining('d-1', '2021-03-04', -100000),
          dining('d-2', '2021-11-20', -50000),
          dining('d-3', '2022-06-01', -300000),
          dining('d-4', '2023-02-14', -150000),
          dining('d-5', '2023-02-20', 30000),
          dining('d-6', '2023-08-08', -999000, true),
          dining('d-7', '2024-01-02', -70000),
        ])
      );
    });

    it('compares each year with the one before', async () => {
      const comparison = await service.compareSpendingByYear(BUDGET, 'cat-dining', 2021, 3, false);

      expect(client.getCategoryTransactions).toHaveBeenCalledWith(BUDGET, 'cat-dining', '2021-01-01');
      expect(comparison).toEqual({
        category_id: 'cat-dining',
        category_name: 'Dining Out',
        start_year: 2021,
        num_years: 3,
        years: [
          { year: 2021, total_spent: 150, transaction_count: 2, change: null, percent_change: null },
          { year: 2022, total_spent: 300, transaction_count: 1, change: 150, percent_change: 100 },
          { year: 2023, total_spent: 120, transaction_count: 2, change: -180, percent_change: -60 },
        ],
      });
    });

    it('renders a bar per year', async () => {
      const comparison = await service.compareSpendingByYear(BUDGET, 'cat-dining', 2021, 3);

      expect(comparison.graph?.split('\n')).toEqual([
        'Yearly spending: Dining Out',
        `2021 | ${bars(20)} $150.00`,
        `2022 | ${bars(40)} $300.00`,
        `2023 | ${bars(16)} $120.00`,
      ]);
    });

    it('leaves percent change empty after a year with no spending', async () => {
      client.getCategoryTransactions.mockResolvedValue(
        createTransactionsResponse([dining('d-1', '2021-05-05', -10000)])
      );

      const comparison = await service.compareSpendingByYear(BUDGET, 'cat-dining', 2020, 2, false);

      expect(comparison.years[1]).toEqual({
        year: 2021,
        total_spent: 10,
        transaction_count: 1,
        change: 10,
        percent_change: null,
      });
    });

    it.each([0, 21, 2.5])('rejects num_years %s', async (numYears) => {
      await expect(
        service.compareSpendingByYear(BUDGET, 'cat-dining', 2021, numYears)
      ).rejects.toBeInstanceOf(ValidationError);
      expect(client.getCategoryTransactions).not.toHaveBeenCalled();
    });

    it('rejects a year that is not four digits', async () => {
      await expect(
        service.compareSpendingByYear(BUDGET, 'cat-dining', 24, 1)
      ).rejects.toMatchObject({ field: 'start_year' });
    });
  });
});
