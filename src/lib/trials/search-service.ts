import type { PaginationEnvelope } from '@/lib/pagination-schema';
import type { FilterSpec } from './filter-spec';
import { composeSearchPlan } from './query-composer';
import { runPagedQuery } from './paged-query';
import { resolveIsSaved } from './personalization';
import type { CatalogDatabase } from './repository';
import type { TrialDetail, TrialSummary } from './types';

export class TrialSearchService {
  constructor(private readonly database: CatalogDatabase) {}

  /**
   * One page of matching trials plus the unbounded total, each row carrying
   * the viewer's saved flag.
   */
  async search(spec: FilterSpec, viewerId: string | null): Promise<PaginationEnvelope<TrialSummary>> {
    const plan = composeSearchPlan(spec, viewerId);
    return this.database.withSession((session) => runPagedQuery(session.trials, plan));
  }

  async getTrialDetail(trialId: string, viewerId: string | null): Promise<TrialDetail | null> {
    return this.database.withSession(async (session) => {
      const trial = await session.trials.findById(trialId);
      if (!trial) {
        return null;
      }
      const isSaved = await resolveIsSaved(session.savedTrials, viewerId, trialId);
      return { ...trial, isSaved };
    });
  }
}
