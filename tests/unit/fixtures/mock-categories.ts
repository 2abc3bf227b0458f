/**
 * Mock Category Fixtures
 *
 * Category groups cover every filtering case: visible, hidden and deleted
 * categories, a hidden group, a group whose categories are all hidden,
 * and a deleted group.
 */

import type { WireCategory, WireCategoryGroup } from '../../../src/services/normalize.js';

// Helper to create a category
export function createCategory(
  overrides: Partial<WireCategory> & { id: string; name: string }
): WireCategory {
  return {
    category_group_id: 'group-everyday',
    hidden: false,
    deleted: false,
    note: null,
    budgeted: 0,
    activity: 0,
    balance: 0,
    goal_type: null,
    goal_target: null,
    goal_target_month: null,
    goal_percentage_complete: null,
    goal_under_funded: null,
    ...overrides,
  };
}

export const mockRentCategory = createCategory({
  id: 'cat-rent',
  name: 'Rent',
  category_group_id: 'group-bills',
  budgeted: 1500000, // $1,500
  activity: -1500000,
  balance: 0,
  goal_type: 'MF',
  goal_target: 1500000,
  goal_percentage_complete: 100,
  goal_under_funded: 0,
});

export const mockUtilitiesCategory = createCategory({
  id: 'cat-utilities',
  name: 'Utilities',
  category_group_id: 'group-bills',
  budgeted: 200000,
  activity: -175000,
  balance: 25000,
  note: 'Power and water',
});

export const mockGroceriesCategory = createCategory({
  id: 'cat-groceries',
  name: 'Groceries',
  budgeted: 600000,
  activity: -452300,
  balance: 147700,
});

export const mockDiningCategory = createCategory({
  id: 'cat-dining',
  name: 'Dining Out',
  budgeted: 200000,
  activity: -250000,
  balance: -50000, // overspent
});

export const mockHiddenCategory = createCategory({
  id: 'cat-old-hobby',
  name: 'Old Hobby',
  hidden: true,
});

export const mockDeletedCategory = createCategory({
  id: 'cat-removed',
  name: 'Removed',
  deleted: true,
});

export const mockCategoryGroups: WireCategoryGroup[] = [
  {
    id: 'group-bills',
    name: 'Bills',
    hidden: false,
    deleted: false,
    categories: [mockRentCategory, mockUtilitiesCategory],
  },
  {
    id: 'group-everyday',
    name: 'Everyday',
    hidden: false,
    deleted: false,
    categories: [mockGroceriesCategory, mockDiningCategory, mockHiddenCategory, mockDeletedCategory],
  },
  {
    id: 'group-archive',
    name: 'Archive',
    hidden: true,
    deleted: false,
    categories: [
      createCategory({ id: 'cat-archived', name: 'Archived Stuff', category_group_id: 'group-archive' }),
    ],
  },
  {
    id: 'group-retired',
    name: 'Retired',
    hidden: false,
    deleted: false,
    categories: [
      createCategory({
        id: 'cat-retired',
        name: 'Retired Category',
        category_group_id: 'group-retired',
        hidden: true,
      }),
    ],
  },
  {
    id: 'group-deleted',
    name: 'Deleted Group',
    hidden: false,
    deleted: true,
    categories: [
      createCategory({ id: 'cat-ghost', name: 'Ghost', category_group_id: 'group-deleted' }),
    ],
  },
];

export function createCategoriesResponse(groups: WireCategoryGroup[] = mockCategoryGroups) {
  return {
    data: {
      category_groups: groups,
      server_knowledge: 100,
    },
  };
}

export function createCategoryResponse(category: WireCategory = mockRentCategory) {
  return {
    data: {
      category,
    },
  };
}

/**
 * Month detail for March 2024. The last category points at a group that
 * the categories listing does not contain.
 */
export const mockMonthCategories: WireCategory[] = [
  mockRentCategory,
  mockGroceriesCategory,
  mockDiningCategory,
  createCategory({ id: 'cat-stray', name: 'Stray', category_group_id: 'group-missing' }),
];

export function createMonthResponse(categories: WireCategory[] = mockMonthCategories) {
  return {
    data: {
      month: {
        month: '2024-03-01',
        note: null,
        income: 5000000,
        budgeted: 2300000,
        activity: -2202300,
        to_be_budgeted: 125000,
        age_of_money: 42,
        deleted: false,
        categories,
      },
    },
  };
}
