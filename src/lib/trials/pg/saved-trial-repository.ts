import type { SavedTrialRepository } from '../repository';
import type { SavedTrial } from '../types';
import { runQuery } from './executor';
import type { SqlExecutor } from './executor';
import { SITE_LOCATION_SUBQUERY } from './search-sql';
import { mapSavedTrial } from './row-mappers';
import type { SavedTrialRaw } from './row-mappers';

export class PgSavedTrialRepository implements SavedTrialRepository {
  constructor(private readonly executor: SqlExecutor) {}

  // One statement: the unique (user_id, trial_id) constraint decides, not a pre-check
  async insert(viewerId: string, trialId: string, notes: string | null): Promise<boolean> {
    const rows = await runQuery<{ inserted: number }>(this.executor, 'savedTrials.insert', {
      text: `
        INSERT INTO trial_saves (user_id, trial_id, notes, saved_at)
        VALUES ($1, $2, $3, NOW())
        ON CONFLICT (user_id, trial_id) DO NOTHING
        RETURNING 1 AS inserted
      `,
      values: [viewerId, trialId, notes],
    });
    return rows.length > 0;
  }

  async remove(viewerId: string, trialId: string): Promise<boolean> {
    const rows = await runQuery<{ removed: number }>(this.executor, 'savedTrials.remove', {
      text: `
        DELETE FROM trial_saves
        WHERE user_id = $1 AND trial_id = $2
        RETURNING 1 AS removed
      `,
      values: [viewerId, trialId],
    });
    return rows.length > 0;
  }

  async isSaved(viewerId: string, trialId: string): Promise<boolean> {
    const [row] = await runQuery<{ saved: boolean }>(this.executor, 'savedTrials.isSaved', {
      text: `
        SELECT EXISTS (
          SELECT 1 FROM trial_saves WHERE user_id = $1 AND trial_id = $2
        ) AS saved
      `,
      values: [viewerId, trialId],
    });
    return row?.saved ?? false;
  }

  async listForViewer(viewerId: string): Promise<SavedTrial[]> {
    const rows = await runQuery<SavedTrialRaw>(this.executor, 'savedTrials.listForViewer', {
      text: `
        SELECT
          t.trial_id AS id,
          t.nct_id,
          t.title,
          t.disease_area,
          t.phase,
          t.status,
          t.sponsor,
          t.enrollment,
          ${SITE_LOCATION_SUBQUERY} AS location,
          sv.notes,
          sv.saved_at
        FROM trial_saves sv
        JOIN clinical_trials t ON t.trial_id = sv.trial_id
        WHERE sv.user_id = $1
        ORDER BY sv.saved_at DESC, t.trial_id ASC
      `,
      values: [viewerId],
    });
    return rows.map(mapSavedTrial);
  }
}
