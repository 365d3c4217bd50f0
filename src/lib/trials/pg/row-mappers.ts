/**
 * Raw row shapes returned by node-postgres and their mapping into domain
 * types. Numeric aggregates arrive as strings (bigint), timestamps as Date,
 * jsonb already parsed.
 */

import { z } from 'zod';
import { DataTransformError } from '@/lib/errors';
import { ALERT_FREQUENCIES, filterCriteriaSchema } from '../types';
import type {
  AlertSubscription,
  FilterCriteria,
  SavedTrial,
  TrialInterest,
  TrialRecord,
  TrialSite,
  TrialSummary,
} from '../types';

export interface TrialSummaryRaw {
  id: string;
  nct_id: string | null;
  title: string;
  disease_area: string | null;
  phase: string | null;
  status: string | null;
  sponsor: string | null;
  enrollment: number | string | null;
  created_at: Date;
  location: string | null;
  is_saved: boolean;
  rank: number | string | null;
}

export interface TrialRecordRaw {
  id: string;
  nct_id: string | null;
  title: string;
  summary: string | null;
  disease_area: string | null;
  phase: string | null;
  status: string | null;
  sponsor: string | null;
  eligibility_criteria: string | null;
  enrollment: number | string | null;
  max_enrollment: number | string | null;
  start_date: string | null;
  estimated_completion: string | null;
  metadata: unknown;
  location: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface TrialSiteRaw {
  id: string;
  site_name: string;
  country: string;
  city: string;
  address: string | null;
  contact_email: string | null;
  contact_phone: string | null;
  is_recruiting: boolean;
}

export interface SavedTrialRaw {
  id: string;
  nct_id: string | null;
  title: string;
  disease_area: string | null;
  phase: string | null;
  status: string | null;
  sponsor: string | null;
  enrollment: number | string | null;
  location: string | null;
  notes: string | null;
  saved_at: Date;
}

export interface AlertRaw {
  id: string;
  user_id: string;
  trial_id: string | null;
  disease_area: string | null;
  location: string | null;
  phase: string | null;
  filter_criteria: unknown;
  alert_frequency: string;
  is_active: boolean;
  last_notified: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface InterestRaw {
  id: string;
  trial_id: string;
  user_id: string;
  message: string | null;
  created_at: Date;
}

export function toNumberOrNull(value: number | string | null): number | null {
  if (value === null) {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function parseJsonObject(value: unknown, operation: string): FilterCriteria {
  if (value === null || value === undefined) {
    return {};
  }
  const result = filterCriteriaSchema.safeParse(value);
  if (!result.success) {
    throw new DataTransformError(operation, result.error);
  }
  return result.data;
}

const alertFrequencySchema = z.enum(ALERT_FREQUENCIES);

export function mapTrialSummary(row: TrialSummaryRaw): TrialSummary {
  return {
    id: row.id,
    nctId: row.nct_id,
    title: row.title,
    diseaseArea: row.disease_area,
    phase: row.phase,
    status: row.status,
    sponsor: row.sponsor,
    location: row.location,
    enrollment: toNumberOrNull(row.enrollment),
    isSaved: row.is_saved,
    rank: toNumberOrNull(row.rank) ?? 0,
    createdAt: row.created_at,
  };
}

export function mapTrialSite(row: TrialSiteRaw): TrialSite {
  return {
    id: row.id,
    siteName: row.site_name,
    country: row.country,
    city: row.city,
    address: row.address,
    contactEmail: row.contact_email,
    contactPhone: row.contact_phone,
    isRecruiting: row.is_recruiting,
  };
}

export function mapTrialRecord(row: TrialRecordRaw, sites: TrialSiteRaw[]): TrialRecord {
  return {
    id: row.id,
    nctId: row.nct_id,
    title: row.title,
    summary: row.summary,
    diseaseArea: row.disease_area,
    phase: row.phase,
    status: row.status,
    sponsor: row.sponsor,
    eligibilityCriteria: row.eligibility_criteria,
    enrollment: toNumberOrNull(row.enrollment),
    maxEnrollment: toNumberOrNull(row.max_enrollment),
    startDate: row.start_date,
    estimatedCompletion: row.estimated_completion,
    metadata: parseJsonObject(row.metadata, 'trial.metadata'),
    location: row.location,
    sites: sites.map(mapTrialSite),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function mapSavedTrial(row: SavedTrialRaw): SavedTrial {
  return {
    id: row.id,
    nctId: row.nct_id,
    title: row.title,
    diseaseArea: row.disease_area,
    phase: row.phase,
    status: row.status,
    sponsor: row.sponsor,
    location: row.location,
    enrollment: toNumberOrNull(row.enrollment),
    notes: row.notes,
    savedAt: row.saved_at,
  };
}

export function mapAlert(row: AlertRaw): AlertSubscription {
  const frequency = alertFrequencySchema.safeParse(row.alert_frequency);
  if (!frequency.success) {
    throw new DataTransformError('alert.alert_frequency', frequency.error);
  }

  return {
    id: row.id,
    ownerId: row.user_id,
    trialId: row.trial_id,
    diseaseArea: row.disease_area,
    location: row.location,
    phase: row.phase,
    filterCriteria: parseJsonObject(row.filter_criteria, 'alert.filter_criteria'),
    frequency: frequency.data,
    isActive: row.is_active,
    lastNotified: row.last_notified,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function mapInterest(row: InterestRaw): TrialInterest {
  return {
    id: row.id,
    trialId: row.trial_id,
    userId: row.user_id,
    message: row.message,
    createdAt: row.created_at,
  };
}
