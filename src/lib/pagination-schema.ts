/**
 * Shared offset pagination schema and utilities
 *
 * - Default limit: 20
 * - Max limit: 100
 * - Page is 1-based with no upper bound; past the last page there are no items
 */

import { z } from 'zod';

export const DEFAULT_PAGE_LIMIT = 20;
export const MAX_PAGE_LIMIT = 100;

// Largest OFFSET handed to storage; beyond it a page is empty anyway
export const MAX_OFFSET = Number.MAX_SAFE_INTEGER;

export const pageSchema = z.coerce
  .number({ invalid_type_error: 'page must be a number' })
  .int('page must be an integer')
  .min(1, 'page must be at least 1')
  .default(1);

export const limitSchema = z.coerce
  .number({ invalid_type_error: 'limit must be a number' })
  .int('limit must be an integer')
  .min(1, 'limit must be at least 1')
  .max(MAX_PAGE_LIMIT, `limit must be at most ${MAX_PAGE_LIMIT}`)
  .default(DEFAULT_PAGE_LIMIT);

export interface PaginationEnvelope<T> {
  items: T[];
  total: number;
  page: number;
  limit: number;
  pages: number;
}

/**
 * Rows to skip before the requested page, clamped to MAX_OFFSET
 */
export function pageOffset(page: number, limit: number): number {
  return Math.min((page - 1) * limit, MAX_OFFSET);
}

/**
 * ceil(total / limit) in integer arithmetic; 0 only when total is 0
 */
export function pageCount(total: number, limit: number): number {
  if (limit < 1) {
    throw new RangeError('limit must be at least 1');
  }
  return Math.floor((total + limit - 1) / limit);
}

/**
 * Build the response envelope. An out-of-range page keeps the real total
 * and simply carries no items.
 */
export function buildPaginationEnvelope<T>(
  items: T[],
  total: number,
  page: number,
  limit: number
): PaginationEnvelope<T> {
  return {
    items: items.slice(0, limit),
    total,
    page,
    limit,
    pages: pageCount(total, limit),
  };
}
