/**
 * "Express interest" in a trial: record a lead and bump the trial's
 * interest counter atomically, then tell the trial's contacts.
 */

import { NotFoundError } from '@/lib/errors';
import { logger, sanitizeErrorMessage } from '@/lib/logger';
import type { CatalogDatabase } from './repository';
import type { TrialInterest, TrialRecord } from './types';

export interface InterestNotification {
  trial: TrialRecord;
  viewerId: string;
  message: string | null;
  /** Contact e-mails of the trial's sites */
  contacts: string[];
}

export interface InterestNotifier {
  interestExpressed(notification: InterestNotification): Promise<void>;
}

/**
 * Default notifier: delivery is out of scope, so the event is only logged.
 * Contacts are counted, never written out.
 */
export const loggingInterestNotifier: InterestNotifier = {
  async interestExpressed({ trial, viewerId, contacts }) {
    await logger.info('Trial interest expressed', {
      trialId: trial.id,
      viewerId,
      contactCount: contacts.length,
    });
  },
};

export class TrialInterestService {
  constructor(
    private readonly database: CatalogDatabase,
    private readonly notifier: InterestNotifier
  ) {}

  async expressInterest(
    viewerId: string,
    trialId: string,
    message: string | null = null
  ): Promise<TrialInterest> {
    // Counter and lead commit together or not at all
    const interest = await this.database.withTransaction(async (session) => {
      const count = await session.trials.incrementInterestCount(trialId);
      if (count === null) {
        throw new NotFoundError('Trial not found');
      }
      return session.interests.insert(viewerId, trialId, message);
    });

    await this.notify(interest);
    return interest;
  }

  // Runs after commit; a failed notification does not undo the interest
  private async notify(interest: TrialInterest): Promise<void> {
    try {
      const trial = await this.database.withSession((session) =>
        session.trials.findById(interest.trialId)
      );
      if (!trial) {
        return;
      }
      const contacts = trial.sites
        .map((site) => site.contactEmail)
        .filter((email): email is string => Boolean(email));

      await this.notifier.interestExpressed({
        trial,
        viewerId: interest.userId,
        message: interest.message,
        contacts,
      });
    } catch (error) {
      logger.sync.warn('Interest notification failed', {
        interestId: interest.id,
        trialId: interest.trialId,
        error: sanitizeErrorMessage(error),
      });
    }
  }
}
