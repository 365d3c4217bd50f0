import type { TrialRepository } from '../repository';
import type { CountQueryPlan, PageQueryPlan } from '../query-composer';
import type { TrialRecord, TrialSummary } from '../types';
import { runQuery } from './executor';
import type { SqlExecutor } from './executor';
import { buildSearchCountQuery, buildSearchPageQuery, SITE_LOCATION_SUBQUERY } from './search-sql';
import { mapTrialRecord, mapTrialSummary } from './row-mappers';
import type { TrialRecordRaw, TrialSiteRaw, TrialSummaryRaw } from './row-mappers';

export class PgTrialRepository implements TrialRepository {
  constructor(private readonly executor: SqlExecutor) {}

  async fetchPage(plan: PageQueryPlan): Promise<TrialSummary[]> {
    const rows = await runQuery<TrialSummaryRaw>(
      this.executor,
      'trials.fetchPage',
      buildSearchPageQuery(plan)
    );
    return rows.map(mapTrialSummary);
  }

  async count(plan: CountQueryPlan): Promise<number> {
    const rows = await runQuery<{ count: string | number }>(
      this.executor,
      'trials.count',
      buildSearchCountQuery(plan)
    );
    return Number(rows[0]?.count ?? 0);
  }

  async findById(trialId: string): Promise<TrialRecord | null> {
    const [row] = await runQuery<TrialRecordRaw>(this.executor, 'trials.findById', {
      text: `
        SELECT
          t.trial_id AS id,
          t.nct_id,
          t.title,
          t.summary,
          t.disease_area,
          t.phase,
          t.status,
          t.sponsor,
          t.eligibility_criteria,
          t.enrollment,
          t.max_enrollment,
          to_char(t.start_date, 'YYYY-MM-DD') AS start_date,
          to_char(t.estimated_completion, 'YYYY-MM-DD') AS estimated_completion,
          t.metadata,
          ${SITE_LOCATION_SUBQUERY} AS location,
          t.created_at,
          t.updated_at
        FROM clinical_trials t
        WHERE t.trial_id = $1
      `,
      values: [trialId],
    });

    if (!row) {
      return null;
    }

    const sites = await runQuery<TrialSiteRaw>(this.executor, 'trials.findSites', {
      text: `
        SELECT
          site_id AS id,
          site_name,
          country,
          city,
          address,
          contact_email,
          contact_phone,
          is_recruiting
        FROM trial_sites
        WHERE trial_id = $1
        ORDER BY country ASC, city ASC, site_name ASC
      `,
      values: [trialId],
    });

    return mapTrialRecord(row, sites);
  }

  async incrementInterestCount(trialId: string): Promise<number | null> {
    const [row] = await runQuery<{ interest_count: number }>(
      this.executor,
      'trials.incrementInterestCount',
      {
        text: `
          UPDATE clinical_trials
          SET metadata = jsonb_set(
                COALESCE(metadata, '{}'::jsonb),
                '{interest_count}',
                to_jsonb(COALESCE((metadata->>'interest_count')::int, 0) + 1)
              ),
              updated_at = NOW()
          WHERE trial_id = $1
          RETURNING (metadata->>'interest_count')::int AS interest_count
        `,
        values: [trialId],
      }
    );
    return row ? row.interest_count : null;
  }
}
