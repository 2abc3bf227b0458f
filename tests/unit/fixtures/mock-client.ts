import { vi } from 'vitest';
import { BudgetService, type BudgetServiceOptions } from '../../../src/services/budget-service.js';

export function createMockClient() {
  return {
    // Budget endpoints
    getBudgets: vi.fn(),

    // Account endpoints
    getAccounts: vi.fn(),

    // Category endpoints
    getCategories: vi.fn(),
    getCategoryById: vi.fn(),
    updateMonthCategory: vi.fn(),
    updateCategory: vi.fn(),

    // Month endpoints
    getBudgetMonth: vi.fn(),

    // Transaction endpoints
    getTransactions: vi.fn(),
    getAccountTransactions: vi.fn(),
    getCategoryTransactions: vi.fn(),
    getTransactionById: vi.fn(),
    createTransaction: vi.fn(),
    updateTransaction: vi.fn(),

    // Scheduled transaction endpoints
    getScheduledTransactions: vi.fn(),
    createScheduledTransaction: vi.fn(),
    deleteScheduledTransaction: vi.fn(),
  };
}

export type MockClient = ReturnType<typeof createMockClient>;

/**
 * A BudgetService over the mock client, defaulting to budget "test-budget-id".
 */
export function createTestService(
  client: MockClient,
  options: BudgetServiceOptions = { defaultBudgetId: 'test-budget-id' }
): BudgetService {
  return new BudgetService(client as never, options);
}
