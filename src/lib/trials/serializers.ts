/**
 * Wire (snake_case JSON) representations of the trial domain types.
 */

import type { PaginationEnvelope } from '@/lib/pagination-schema';
import type {
  AlertSubscription,
  FilterCriteria,
  SavedTrial,
  TrialDetail,
  TrialInterest,
  TrialSite,
  TrialSummary,
} from './types';

export interface TrialSummaryJson {
  id: string;
  nct_id: string | null;
  title: string;
  disease_area: string | null;
  phase: string | null;
  status: string | null;
  sponsor: string | null;
  location: string | null;
  enrollment: number | null;
  is_saved: boolean;
  rank: number;
  created_at: string;
}

export interface TrialSiteJson {
  id: string;
  site_name: string;
  country: string;
  city: string;
  address: string | null;
  contact_email: string | null;
  contact_phone: string | null;
  is_recruiting: boolean;
}

export interface TrialDetailJson {
  id: string;
  nct_id: string | null;
  title: string;
  summary: string | null;
  disease_area: string | null;
  phase: string | null;
  status: string | null;
  sponsor: string | null;
  eligibility_criteria: string | null;
  enrollment: number | null;
  max_enrollment: number | null;
  start_date: string | null;
  estimated_completion: string | null;
  metadata: FilterCriteria;
  location: string | null;
  sites: TrialSiteJson[];
  is_saved: boolean;
  created_at: string;
  updated_at: string;
}

export interface SavedTrialJson {
  id: string;
  nct_id: string | null;
  title: string;
  disease_area: string | null;
  phase: string | null;
  status: string | null;
  sponsor: string | null;
  location: string | null;
  enrollment: number | null;
  notes: string | null;
  saved_at: string;
}

export interface AlertJson {
  alert_id: string;
  trial_id: string | null;
  disease_area: string | null;
  location: string | null;
  phase: string | null;
  filter_criteria: FilterCriteria;
  alert_frequency: string;
  is_active: boolean;
  last_notified: string | null;
  created_at: string;
  updated_at: string;
}

export interface InterestJson {
  interest_id: string;
  trial_id: string;
  user_id: string;
  message: string | null;
  created_at: string;
}

export function toTrialSummaryJson(trial: TrialSummary): TrialSummaryJson {
  return {
    id: trial.id,
    nct_id: trial.nctId,
    title: trial.title,
    disease_area: trial.diseaseArea,
    phase: trial.phase,
    status: trial.status,
    sponsor: trial.sponsor,
    location: trial.location,
    enrollment: trial.enrollment,
    is_saved: trial.isSaved,
    rank: trial.rank,
    created_at: trial.createdAt.toISOString(),
  };
}

export function toTrialPageJson(
  page: PaginationEnvelope<TrialSummary>
): PaginationEnvelope<TrialSummaryJson> {
  return { ...page, items: page.items.map(toTrialSummaryJson) };
}

function toTrialSiteJson(site: TrialSite): TrialSiteJson {
  return {
    id: site.id,
    site_name: site.siteName,
    country: site.country,
    city: site.city,
    address: site.address,
    contact_email: site.contactEmail,
    contact_phone: site.contactPhone,
    is_recruiting: site.isRecruiting,
  };
}

export function toTrialDetailJson(trial: TrialDetail): TrialDetailJson {
  return {
    id: trial.id,
    nct_id: trial.nctId,
    title: trial.title,
    summary: trial.summary,
    disease_area: trial.diseaseArea,
    phase: trial.phase,
    status: trial.status,
    sponsor: trial.sponsor,
    eligibility_criteria: trial.eligibilityCriteria,
    enrollment: trial.enrollment,
    max_enrollment: trial.maxEnrollment,
    start_date: trial.startDate,
    estimated_completion: trial.estimatedCompletion,
    metadata: trial.metadata,
    location: trial.location,
    sites: trial.sites.map(toTrialSiteJson),
    is_saved: trial.isSaved,
    created_at: trial.createdAt.toISOString(),
    updated_at: trial.updatedAt.toISOString(),
  };
}

export function toSavedTrialJson(saved: SavedTrial): SavedTrialJson {
  return {
    id: saved.id,
    nct_id: saved.nctId,
    title: saved.title,
    disease_area: saved.diseaseArea,
    phase: saved.phase,
    status: saved.status,
    sponsor: saved.sponsor,
    location: saved.location,
    enrollment: saved.enrollment,
    notes: saved.notes,
    saved_at: saved.savedAt.toISOString(),
  };
}

export function toAlertJson(alert: AlertSubscription): AlertJson {
  return {
    alert_id: alert.id,
    trial_id: alert.trialId,
    disease_area: alert.diseaseArea,
    location: alert.location,
    phase: alert.phase,
    filter_criteria: alert.filterCriteria,
    alert_frequency: alert.frequency,
    is_active: alert.isActive,
    last_notified: alert.lastNotified ? alert.lastNotified.toISOString() : null,
    created_at: alert.createdAt.toISOString(),
    updated_at: alert.updatedAt.toISOString(),
  };
}

export function toInterestJson(interest: TrialInterest): InterestJson {
  return {
    interest_id: interest.id,
    trial_id: interest.trialId,
    user_id: interest.userId,
    message: interest.message,
    created_at: interest.createdAt.toISOString(),
  };
}
