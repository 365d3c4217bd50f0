/**
 * Matching of stored alert subscriptions against a trial.
 *
 * Only the contract and a field-level matcher live here. When matching runs
 * (on a cadence, on trial writes) is decided by whoever calls it.
 */

import type { AlertSubscription, TrialRecord } from './types';

export type MatchableTrial = Pick<TrialRecord, 'id' | 'diseaseArea' | 'phase' | 'sites'>;

export interface AlertMatcher {
  /** Subset of `alerts` whose filters accept `trial` */
  match(trial: MatchableTrial, alerts: readonly AlertSubscription[]): AlertSubscription[];
}

function sameText(filter: string, value: string | null): boolean {
  return value !== null && filter.trim().toLowerCase() === value.trim().toLowerCase();
}

function siteLocationContains(trial: MatchableTrial, location: string): boolean {
  const needle = location.trim().toLowerCase();
  return trial.sites.some(
    (site) => site.city.toLowerCase().includes(needle) || site.country.toLowerCase().includes(needle)
  );
}

/**
 * Every field that is set must accept the trial; unset fields do not
 * constrain. filter_criteria is opaque and not consulted.
 */
export function alertMatchesTrial(alert: AlertSubscription, trial: MatchableTrial): boolean {
  if (!alert.isActive) return false;
  if (alert.trialId !== null && alert.trialId !== trial.id) return false;
  if (alert.diseaseArea && !sameText(alert.diseaseArea, trial.diseaseArea)) return false;
  if (alert.phase && !sameText(alert.phase, trial.phase)) return false;
  if (alert.location && !siteLocationContains(trial, alert.location)) return false;
  return true;
}

export const fieldAlertMatcher: AlertMatcher = {
  match(trial, alerts) {
    return alerts.filter((alert) => alertMatchesTrial(alert, trial));
  },
};
