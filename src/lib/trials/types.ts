/**
 * Domain types for the trial catalog.
 * Repositories return these shapes; routes serialize them to snake_case.
 */

import { z } from 'zod';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** Schema-less criteria bag stored with an alert and returned unchanged */
export type FilterCriteria = { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

// A record parse drops this key silently; refuse it so the bag round-trips
const RESERVED_KEY = '__proto__';

function containsReservedKey(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.some(containsReservedKey);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.entries(value).some(
      ([key, nested]) => key === RESERVED_KEY || containsReservedKey(nested)
    );
  }
  return false;
}

export const filterCriteriaSchema = z
  .unknown()
  .refine((value) => !containsReservedKey(value), {
    message: `filter_criteria must not use the key ${RESERVED_KEY}`,
  })
  .pipe(z.record(jsonValueSchema));

export const ALERT_FREQUENCIES = ['instant', 'daily', 'weekly'] as const;
export type AlertFrequency = (typeof ALERT_FREQUENCIES)[number];

export interface TrialSite {
  id: string;
  siteName: string;
  country: string;
  city: string;
  address: string | null;
  contactEmail: string | null;
  contactPhone: string | null;
  isRecruiting: boolean;
}

/** One row of a search result page */
export interface TrialSummary {
  id: string;
  nctId: string | null;
  title: string;
  diseaseArea: string | null;
  phase: string | null;
  status: string | null;
  sponsor: string | null;
  /** "City, Country; City, Country" across all sites */
  location: string | null;
  enrollment: number | null;
  isSaved: boolean;
  /** 0 unless the search carried a keyword */
  rank: number;
  createdAt: Date;
}

export interface TrialRecord {
  id: string;
  nctId: string | null;
  title: string;
  summary: string | null;
  diseaseArea: string | null;
  phase: string | null;
  status: string | null;
  sponsor: string | null;
  eligibilityCriteria: string | null;
  enrollment: number | null;
  maxEnrollment: number | null;
  /** YYYY-MM-DD */
  startDate: string | null;
  /** YYYY-MM-DD */
  estimatedCompletion: string | null;
  metadata: FilterCriteria;
  location: string | null;
  sites: TrialSite[];
  createdAt: Date;
  updatedAt: Date;
}

export interface TrialDetail extends TrialRecord {
  isSaved: boolean;
}

export interface SavedTrial {
  id: string;
  nctId: string | null;
  title: string;
  diseaseArea: string | null;
  phase: string | null;
  status: string | null;
  sponsor: string | null;
  location: string | null;
  enrollment: number | null;
  notes: string | null;
  savedAt: Date;
}

export interface AlertSubscription {
  id: string;
  ownerId: string;
  trialId: string | null;
  diseaseArea: string | null;
  location: string | null;
  phase: string | null;
  filterCriteria: FilterCriteria;
  frequency: AlertFrequency;
  isActive: boolean;
  lastNotified: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewAlertSubscription {
  trialId: string | null;
  diseaseArea: string | null;
  location: string | null;
  phase: string | null;
  filterCriteria: FilterCriteria;
  frequency: AlertFrequency;
}

/** Fields left undefined are not touched */
export type AlertPatch = Partial<NewAlertSubscription & { isActive: boolean }>;

export interface TrialInterest {
  id: string;
  trialId: string;
  userId: string;
  message: string | null;
  createdAt: Date;
}
