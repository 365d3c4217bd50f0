import type { InterestRepository } from '../repository';
import type { TrialInterest } from '../types';
import { runQuery } from './executor';
import type { SqlExecutor } from './executor';
import { mapInterest } from './row-mappers';
import type { InterestRaw } from './row-mappers';

export class PgInterestRepository implements InterestRepository {
  constructor(private readonly executor: SqlExecutor) {}

  async insert(viewerId: string, trialId: string, message: string | null): Promise<TrialInterest> {
    const [row] = await runQuery<InterestRaw>(this.executor, 'interests.insert', {
      text: `
        INSERT INTO trial_interests (user_id, trial_id, message, created_at)
        VALUES ($1, $2, $3, NOW())
        RETURNING interest_id AS id, trial_id, user_id, message, created_at
      `,
      values: [viewerId, trialId, message],
    });

    if (!row) {
      throw new Error('Interest insert returned no row');
    }
    return mapInterest(row);
  }
}
