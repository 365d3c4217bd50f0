/**
 * Saved trials (bookmarks), unique per (viewer, trial).
 *
 * There is no existence check before a save: the foreign key on
 * trial_saves.trial_id rejects unknown trials and that rejection is
 * reported as "Trial not found".
 */

import { isIntegrityError, NotFoundError } from '@/lib/errors';
import { logger } from '@/lib/logger';
import type { CatalogDatabase } from './repository';
import type { SavedTrial } from './types';

export class SavedTrialStore {
  constructor(private readonly database: CatalogDatabase) {}

  /**
   * @returns true on first save, false when the pair was already saved
   */
  async save(viewerId: string, trialId: string, notes: string | null = null): Promise<boolean> {
    try {
      const inserted = await this.database.withSession((session) =>
        session.savedTrials.insert(viewerId, trialId, notes)
      );
      if (inserted) {
        await logger.info('Trial saved', { trialId });
      }
      return inserted;
    } catch (error) {
      if (isIntegrityError(error, 'foreign_key')) {
        throw new NotFoundError('Trial not found');
      }
      throw error;
    }
  }

  async unsave(viewerId: string, trialId: string): Promise<boolean> {
    return this.database.withSession((session) => session.savedTrials.remove(viewerId, trialId));
  }

  /** Newest save first */
  async listSaved(viewerId: string): Promise<SavedTrial[]> {
    return this.database.withSession((session) => session.savedTrials.listForViewer(viewerId));
  }
}
