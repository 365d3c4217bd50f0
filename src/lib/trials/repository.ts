/**
 * Storage seam for the trial catalog. Services depend on these interfaces
 * only; the PostgreSQL adapter lives in ./pg and tests use an in-memory one.
 */

import type { PagedQuerySource } from './paged-query';
import type { SavedLookup } from './personalization';
import type {
  AlertPatch,
  AlertSubscription,
  NewAlertSubscription,
  SavedTrial,
  TrialInterest,
  TrialRecord,
  TrialSummary,
} from './types';

export interface TrialRepository extends PagedQuerySource<TrialSummary> {
  findById(trialId: string): Promise<TrialRecord | null>;
  /** Bumps metadata.interest_count; null when the trial does not exist */
  incrementInterestCount(trialId: string): Promise<number | null>;
}

export interface SavedTrialRepository extends SavedLookup {
  /** false when the (viewer, trial) pair already exists */
  insert(viewerId: string, trialId: string, notes: string | null): Promise<boolean>;
  remove(viewerId: string, trialId: string): Promise<boolean>;
  listForViewer(viewerId: string): Promise<SavedTrial[]>;
}

export interface AlertRepository {
  insert(ownerId: string, alert: NewAlertSubscription): Promise<AlertSubscription>;
  listForOwner(ownerId: string): Promise<AlertSubscription[]>;
  /** null when the alert is missing or owned by someone else */
  update(ownerId: string, alertId: string, patch: AlertPatch): Promise<AlertSubscription | null>;
  remove(ownerId: string, alertId: string): Promise<boolean>;
  listActive(): Promise<AlertSubscription[]>;
}

export interface InterestRepository {
  insert(viewerId: string, trialId: string, message: string | null): Promise<TrialInterest>;
}

/** Repositories bound to one acquired connection */
export interface CatalogSession {
  trials: TrialRepository;
  savedTrials: SavedTrialRepository;
  alerts: AlertRepository;
  interests: InterestRepository;
}

export interface CatalogDatabase {
  /** Acquire one connection for `fn` and release it however `fn` ends */
  withSession<T>(fn: (session: CatalogSession) => Promise<T>): Promise<T>;
  /** As withSession, inside a transaction that rolls back on any error */
  withTransaction<T>(fn: (session: CatalogSession) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
