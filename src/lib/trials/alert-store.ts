/**
 * Alert subscriptions, always scoped by owner.
 *
 * `filterCriteria` is an arbitrary JSON object stored and returned without
 * interpretation; an update replaces it wholesale.
 */

import { isIntegrityError, NotFoundError, ValidationError } from '@/lib/errors';
import { logger } from '@/lib/logger';
import type { CatalogDatabase } from './repository';
import { fieldAlertMatcher } from './alert-matcher';
import type { AlertMatcher, MatchableTrial } from './alert-matcher';
import type { AlertPatch, AlertSubscription, NewAlertSubscription } from './types';

function assertNonEmptyPatch(patch: AlertPatch): void {
  if (Object.values(patch).every((value) => value === undefined)) {
    throw new ValidationError('No fields to update');
  }
}

export class AlertStore {
  constructor(
    private readonly database: CatalogDatabase,
    private readonly matcher: AlertMatcher = fieldAlertMatcher
  ) {}

  async create(ownerId: string, alert: NewAlertSubscription): Promise<AlertSubscription> {
    try {
      const created = await this.database.withSession((session) =>
        session.alerts.insert(ownerId, alert)
      );
      await logger.info('Alert subscription created', {
        alertId: created.id,
        frequency: created.frequency,
        pinned: created.trialId !== null,
      });
      return created;
    } catch (error) {
      throw translatePinnedTrialError(error);
    }
  }

  /** Newest first */
  async list(ownerId: string): Promise<AlertSubscription[]> {
    return this.database.withSession((session) => session.alerts.listForOwner(ownerId));
  }

  /**
   * @returns null when the alert does not exist or belongs to someone else
   */
  async update(
    ownerId: string,
    alertId: string,
    patch: AlertPatch
  ): Promise<AlertSubscription | null> {
    assertNonEmptyPatch(patch);
    try {
      return await this.database.withSession((session) =>
        session.alerts.update(ownerId, alertId, patch)
      );
    } catch (error) {
      throw translatePinnedTrialError(error);
    }
  }

  async delete(ownerId: string, alertId: string): Promise<boolean> {
    return this.database.withSession((session) => session.alerts.remove(ownerId, alertId));
  }

  /** Every active subscription across owners, as matcher input */
  async listActive(): Promise<AlertSubscription[]> {
    return this.database.withSession((session) => session.alerts.listActive());
  }

  /** Active subscriptions, across owners, that the matcher accepts for `trial` */
  async matchingAlerts(trial: MatchableTrial): Promise<AlertSubscription[]> {
    const active = await this.listActive();
    return this.matcher.match(trial, active);
  }
}

function translatePinnedTrialError(error: unknown): unknown {
  return isIntegrityError(error, 'foreign_key') ? new NotFoundError('Trial not found') : error;
}
