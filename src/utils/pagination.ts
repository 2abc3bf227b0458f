/**
 * Local pagination over an already-filtered result set.
 */

import { ValidationError } from './errors.js';

export const DEFAULT_PAGE_SIZE = 100;
export const MAX_PAGE_SIZE = 500;

export interface PaginationMeta {
  page: number;
  per_page: number;
  total_count: number;
  total_pages: number;
  has_next_page: boolean;
  has_prev_page: boolean;
}

export interface Page<T> {
  items: T[];
  pagination: PaginationMeta;
}

/**
 * Resolve a page size, rejecting values outside 1..MAX_PAGE_SIZE.
 */
export function resolvePageSize(limit: number | undefined, field = 'limit'): number {
  const size = limit ?? DEFAULT_PAGE_SIZE;
  if (!Number.isInteger(size) || size < 1 || size > MAX_PAGE_SIZE) {
    throw new ValidationError(
      `${field} must be an integer between 1 and ${MAX_PAGE_SIZE}, got ${size}`,
      field
    );
  }
  return size;
}

export function resolvePage(page: number | undefined): number {
  const current = page ?? 1;
  if (!Number.isInteger(current) || current < 1) {
    throw new ValidationError(`page must be a positive integer, got ${current}`, 'page');
  }
  return current;
}

/**
 * Slice `items` into 1-indexed pages of `limit` items.
 * A page past the end yields an empty slice.
 */
export function paginate<T>(items: T[], limit?: number, page?: number): Page<T> {
  const perPage = resolvePageSize(limit);
  const current = resolvePage(page);

  const totalCount = items.length;
  const totalPages = Math.ceil(totalCount / perPage);
  const start = (current - 1) * perPage;

  return {
    items: items.slice(start, start + perPage),
    pagination: {
      page: current,
      per_page: perPage,
      total_count: totalCount,
      total_pages: totalPages,
      has_next_page: current < totalPages,
      has_prev_page: current > 1,
    },
  };
}
