/**
 * SQL for trial search, folded from predicate descriptors.
 *
 * SECURITY INVARIANT:
 * - Every caller-derived value is pushed to the parameter list and
 *   referenced as a $N placeholder.
 * - Fragments below are static SQL. The WHERE clause is checked for
 *   string literals before it is used.
 */

import type { CountQueryPlan, PageQueryPlan, TrialPredicate } from '../query-composer';
import type { OrderKey, OrderTerm, RelevanceProjection } from '../ranking';
import type { SavedFlagProjection } from '../personalization';
import type { SqlQuery } from './executor';

/** Weighted text document: title ranks above summary */
export const TRIAL_TEXT_DOCUMENT =
  "(setweight(to_tsvector('english', coalesce(t.title, '')), 'A') || " +
  "setweight(to_tsvector('english', coalesce(t.summary, '')), 'B'))";

export const SITE_LOCATION_SUBQUERY = `(
  SELECT string_agg(DISTINCT s.city || ', ' || s.country, '; ')
  FROM trial_sites s
  WHERE s.trial_id = t.trial_id
)`;

const ALLOWED_SQL_STRING_LITERALS = new Set(['english', 'A', 'B', '']);

export function assertParameterizedWhereClause(whereClause: string): void {
  const literalPattern = /'([^']*)'/g;
  for (const match of whereClause.matchAll(literalPattern)) {
    const literalValue = match[1];
    if (!ALLOWED_SQL_STRING_LITERALS.has(literalValue)) {
      throw new Error(
        'SECURITY: Raw string detected in whereClause; use parameterized $N placeholders'
      );
    }
  }
}

/**
 * Positional parameter list. Values registered under a shared key are
 * bound once and reused, so the keyword filter and its rank read the very
 * same $N.
 */
export class SqlParams {
  private readonly values: unknown[] = [];
  private readonly shared = new Map<string, string>();

  add(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }

  addShared(key: string, value: unknown): string {
    const existing = this.shared.get(key);
    if (existing) {
      return existing;
    }
    const placeholder = this.add(value);
    this.shared.set(key, placeholder);
    return placeholder;
  }

  toArray(): unknown[] {
    return [...this.values];
  }
}

/**
 * Escape LIKE metacharacters so caller input matches literally
 * (backslash is the default ILIKE escape character)
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function containsPattern(value: string): string {
  return `%${escapeLikePattern(value)}%`;
}

function keywordQuery(params: SqlParams, keyword: string): string {
  return `plainto_tsquery('english', ${params.addShared('keyword', keyword)})`;
}

function predicateToSql(predicate: TrialPredicate, params: SqlParams): string {
  switch (predicate.kind) {
    case 'text-match':
      return `${TRIAL_TEXT_DOCUMENT} @@ ${keywordQuery(params, predicate.keyword)}`;
    case 'disease-area-in':
      return `t.disease_area = ANY(${params.add([...predicate.values])}::text[])`;
    case 'phase-in':
      return `t.phase = ANY(${params.add([...predicate.values])}::text[])`;
    case 'status-in':
      return `t.status = ANY(${params.add([...predicate.values])}::text[])`;
    case 'site-location-contains': {
      const pattern = params.add(containsPattern(predicate.value));
      return `EXISTS (
        SELECT 1 FROM trial_sites ls
        WHERE ls.trial_id = t.trial_id
          AND (ls.city ILIKE ${pattern} OR ls.country ILIKE ${pattern})
      )`;
    }
    case 'sponsor-contains':
      return `t.sponsor ILIKE ${params.add(containsPattern(predicate.value))}`;
  }
}

/**
 * AND-join the predicates onto an always-true base
 */
export function buildWhereClause(predicates: readonly TrialPredicate[], params: SqlParams): string {
  const conditions = ['TRUE', ...predicates.map((predicate) => predicateToSql(predicate, params))];
  const whereClause = conditions.join(' AND ');
  assertParameterizedWhereClause(whereClause);
  return whereClause;
}

function relevanceToSql(relevance: RelevanceProjection, params: SqlParams): string {
  if (relevance.kind === 'constant-zero') {
    return '0::float4';
  }
  return `ts_rank_cd(${TRIAL_TEXT_DOCUMENT}, ${keywordQuery(params, relevance.keyword)})`;
}

function savedFlagToSql(savedFlag: SavedFlagProjection, params: SqlParams): string {
  if (savedFlag.kind === 'constant-false') {
    return 'FALSE';
  }
  return `EXISTS (
    SELECT 1 FROM trial_saves sv
    WHERE sv.trial_id = t.trial_id AND sv.user_id = ${params.add(savedFlag.viewerId)}
  )`;
}

const ORDER_COLUMNS: Record<OrderKey, string> = {
  relevance: 'rank',
  created_at: 't.created_at',
  enrollment: 't.enrollment',
  id: 't.trial_id',
};

export function buildOrderByClause(ordering: readonly OrderTerm[]): string {
  return ordering
    .map((term) => {
      const direction = term.direction === 'desc' ? 'DESC' : 'ASC';
      return `${ORDER_COLUMNS[term.key]} ${direction}${term.nullsLast ? ' NULLS LAST' : ''}`;
    })
    .join(', ');
}

export function buildSearchPageQuery(plan: PageQueryPlan): SqlQuery {
  const params = new SqlParams();
  const whereClause = buildWhereClause(plan.predicates, params);
  const rankExpr = relevanceToSql(plan.relevance, params);
  const savedExpr = savedFlagToSql(plan.savedFlag, params);
  const limitParam = params.add(plan.limit);
  const offsetParam = params.add(plan.offset);

  const text = `
    SELECT
      t.trial_id AS id,
      t.nct_id,
      t.title,
      t.disease_area,
      t.phase,
      t.status,
      t.sponsor,
      t.enrollment,
      t.created_at,
      ${SITE_LOCATION_SUBQUERY} AS location,
      ${savedExpr} AS is_saved,
      ${rankExpr} AS rank
    FROM clinical_trials t
    WHERE ${whereClause}
    ORDER BY ${buildOrderByClause(plan.ordering)}
    LIMIT ${limitParam} OFFSET ${offsetParam}
  `;

  return { text, values: params.toArray() };
}

export function buildSearchCountQuery(plan: CountQueryPlan): SqlQuery {
  const params = new SqlParams();
  const whereClause = buildWhereClause(plan.predicates, params);

  const text = `
    SELECT COUNT(*) AS count
    FROM clinical_trials t
    WHERE ${whereClause}
  `;

  return { text, values: params.toArray() };
}
