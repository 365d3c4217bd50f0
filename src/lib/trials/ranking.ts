/**
 * Relevance scoring and ordering policy for trial search.
 *
 * The score reuses the keyword of the text-match predicate, so a row is
 * ranked exactly when it was included by that predicate. Every ordering
 * ends on the trial id, which keeps page boundaries stable between requests.
 */

import type { SortOption } from './filter-spec';

export type OrderKey = 'relevance' | 'created_at' | 'enrollment' | 'id';

export interface OrderTerm {
  key: OrderKey;
  direction: 'asc' | 'desc';
  nullsLast?: boolean;
}

export type RelevanceProjection =
  | { kind: 'text-rank'; keyword: string }
  | { kind: 'constant-zero' };

const ID_TIE_BREAK: OrderTerm = { key: 'id', direction: 'asc' };
const NEWEST_FIRST: OrderTerm = { key: 'created_at', direction: 'desc' };

export function relevanceProjection(keyword: string | undefined): RelevanceProjection {
  return keyword ? { kind: 'text-rank', keyword } : { kind: 'constant-zero' };
}

/**
 * Resolve the ORDER BY chain. Relevance without a keyword has nothing to
 * rank and falls back to newest first.
 */
export function resolveOrdering(sortBy: SortOption, keyword: string | undefined): OrderTerm[] {
  switch (sortBy) {
    case 'relevance':
      if (keyword) {
        return [{ key: 'relevance', direction: 'desc' }, NEWEST_FIRST, ID_TIE_BREAK];
      }
      return [NEWEST_FIRST, ID_TIE_BREAK];
    case 'enrollment':
      return [{ key: 'enrollment', direction: 'desc', nullsLast: true }, NEWEST_FIRST, ID_TIE_BREAK];
    case 'newest':
    default:
      return [NEWEST_FIRST, ID_TIE_BREAK];
  }
}
