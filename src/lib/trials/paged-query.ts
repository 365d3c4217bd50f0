import { buildPaginationEnvelope } from '@/lib/pagination-schema';
import type { PaginationEnvelope } from '@/lib/pagination-schema';
import type { CountQueryPlan, PageQueryPlan, SearchPlan } from './query-composer';

export interface PagedQuerySource<T> {
  fetchPage(plan: PageQueryPlan): Promise<T[]>;
  count(plan: CountQueryPlan): Promise<number>;
}

/**
 * Execute a search plan as two round-trips on the same session: the page,
 * then the total. Writes landing between the two can make `total` disagree
 * with `items` by a small margin; that is accepted.
 */
export async function runPagedQuery<T>(
  source: PagedQuerySource<T>,
  plan: SearchPlan
): Promise<PaginationEnvelope<T>> {
  const items = await source.fetchPage(plan.pageQuery);
  const total = await source.count(plan.countQuery);

  return buildPaginationEnvelope(items, total, plan.pageQuery.page, plan.pageQuery.limit);
}
