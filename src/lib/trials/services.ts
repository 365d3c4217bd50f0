import type { CatalogDatabase } from './repository';
import { TrialSearchService } from './search-service';
import { SavedTrialStore } from './saved-trial-store';
import { AlertStore } from './alert-store';
import type { AlertMatcher } from './alert-matcher';
import { loggingInterestNotifier, TrialInterestService } from './interest-service';
import type { InterestNotifier } from './interest-service';

export interface TrialServices {
  search: TrialSearchService;
  savedTrials: SavedTrialStore;
  alerts: AlertStore;
  interests: TrialInterestService;
}

export interface TrialServiceOptions {
  notifier?: InterestNotifier;
  alertMatcher?: AlertMatcher;
}

/**
 * Wire every trial use-case to one storage handle. Storage-agnostic, so
 * tests pass an in-memory CatalogDatabase.
 */
export function buildTrialServices(
  database: CatalogDatabase,
  options: TrialServiceOptions = {}
): TrialServices {
  return {
    search: new TrialSearchService(database),
    savedTrials: new SavedTrialStore(database),
    alerts: new AlertStore(database, options.alertMatcher),
    interests: new TrialInterestService(database, options.notifier ?? loggingInterestNotifier),
  };
}
