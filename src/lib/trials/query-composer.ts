/**
 * QueryComposer
 *
 * Turns a FilterSpec into a page plan and a count plan. Both plans hold the
 * same predicate array, so the total can never be computed from different
 * filters than the page it describes.
 *
 * Predicates are storage-neutral descriptors; the storage adapter folds
 * them into its own query language and binds every value.
 */

import type { FilterSpec } from './filter-spec';
import { pageOffset } from '@/lib/pagination-schema';
import { relevanceProjection, resolveOrdering } from './ranking';
import type { OrderTerm, RelevanceProjection } from './ranking';
import { savedFlagProjection } from './personalization';
import type { SavedFlagProjection } from './personalization';

export type TrialPredicate =
  | { kind: 'text-match'; keyword: string }
  | { kind: 'disease-area-in'; values: readonly string[] }
  | { kind: 'phase-in'; values: readonly string[] }
  | { kind: 'status-in'; values: readonly string[] }
  | { kind: 'site-location-contains'; value: string }
  | { kind: 'sponsor-contains'; value: string };

export interface CountQueryPlan {
  predicates: readonly TrialPredicate[];
}

export interface PageQueryPlan extends CountQueryPlan {
  ordering: readonly OrderTerm[];
  relevance: RelevanceProjection;
  savedFlag: SavedFlagProjection;
  page: number;
  limit: number;
  offset: number;
}

export interface SearchPlan {
  pageQuery: PageQueryPlan;
  countQuery: CountQueryPlan;
}

/**
 * Predicates in a fixed order; absent filters contribute nothing, so an
 * empty list means "every trial".
 */
export function buildPredicates(spec: FilterSpec): TrialPredicate[] {
  const predicates: TrialPredicate[] = [];

  if (spec.keyword) {
    predicates.push({ kind: 'text-match', keyword: spec.keyword });
  }
  if (spec.diseaseAreas.length > 0) {
    predicates.push({ kind: 'disease-area-in', values: spec.diseaseAreas });
  }
  if (spec.phases.length > 0) {
    predicates.push({ kind: 'phase-in', values: spec.phases });
  }
  if (spec.statuses.length > 0) {
    predicates.push({ kind: 'status-in', values: spec.statuses });
  }
  if (spec.location) {
    predicates.push({ kind: 'site-location-contains', value: spec.location });
  }
  if (spec.sponsor) {
    predicates.push({ kind: 'sponsor-contains', value: spec.sponsor });
  }

  return predicates;
}

export function composeSearchPlan(spec: FilterSpec, viewerId: string | null): SearchPlan {
  const predicates = buildPredicates(spec);

  return {
    pageQuery: {
      predicates,
      ordering: resolveOrdering(spec.sortBy, spec.keyword),
      relevance: relevanceProjection(spec.keyword),
      savedFlag: savedFlagProjection(viewerId),
      page: spec.page,
      limit: spec.limit,
      offset: pageOffset(spec.page, spec.limit),
    },
    countQuery: { predicates },
  };
}
