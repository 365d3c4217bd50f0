/**
 * Shared Test Factories
 *
 * Factory functions that return full objects with sensible defaults.
 * Every factory accepts an optional `overrides` parameter to customize any field.
 *
 * Usage:
 *   import { trialId, createTrialFixture } from '@/__tests__/utils/factories'
 *   const trial = createTrialFixture({ id: trialId(1), phase: 'Phase 2' })
 */

import type { FilterSpec } from '@/lib/trials/filter-spec'
import type { AlertSubscription, TrialRecord, TrialSite } from '@/lib/trials/types'

/**
 * Deterministic, valid v4 UUIDs: trialId(1) < trialId(2) < ...
 */
export function testUuid(prefix: string, n: number): string {
  return `${prefix}-0000-4000-8000-${n.toString().padStart(12, '0')}`
}

export const trialId = (n: number) => testUuid('00000000', n)
export const alertId = (n: number) => testUuid('aaaaaaaa', n)

// ---------------------------------------------------------------------------
// Trials
// ---------------------------------------------------------------------------

export interface SiteFixture {
  id?: string
  siteName: string
  city: string
  country: string
  address?: string | null
  contactEmail?: string | null
  contactPhone?: string | null
  isRecruiting?: boolean
}

export interface TrialFixture {
  id: string
  title: string
  nctId?: string | null
  summary?: string | null
  diseaseArea?: string | null
  phase?: string | null
  status?: string | null
  sponsor?: string | null
  eligibilityCriteria?: string | null
  enrollment?: number | null
  maxEnrollment?: number | null
  startDate?: string | null
  estimatedCompletion?: string | null
  metadata?: TrialRecord['metadata']
  createdAt?: Date
  updatedAt?: Date
  sites?: SiteFixture[]
}

export function createTrialFixture(overrides: Partial<TrialFixture> = {}): TrialFixture {
  return {
    id: trialId(1),
    title: 'Metformin in Early Type 2 Diabetes',
    nctId: 'NCT00000001',
    summary: 'Randomized study of glucose control.',
    diseaseArea: 'Diabetes',
    phase: 'Phase 2',
    status: 'Recruiting',
    sponsor: 'Northwind Research',
    eligibilityCriteria: 'Adults 18-65',
    enrollment: 120,
    maxEnrollment: 200,
    startDate: '2024-01-15',
    estimatedCompletion: '2026-06-30',
    metadata: {},
    createdAt: new Date('2024-01-01T00:00:00.000Z'),
    updatedAt: new Date('2024-01-01T00:00:00.000Z'),
    sites: [],
    ...overrides,
  }
}

export function createSite(overrides: Partial<TrialSite> = {}): TrialSite {
  return {
    id: 'site-1',
    siteName: 'General Hospital',
    country: 'USA',
    city: 'Boston',
    address: null,
    contactEmail: null,
    contactPhone: null,
    isRecruiting: true,
    ...overrides,
  }
}

// ---------------------------------------------------------------------------
// Search
// ---------------------------------------------------------------------------

export function createFilterSpec(overrides: Partial<FilterSpec> = {}): FilterSpec {
  return {
    diseaseAreas: [],
    phases: [],
    statuses: [],
    page: 1,
    limit: 20,
    sortBy: 'relevance',
    ...overrides,
  }
}

// ---------------------------------------------------------------------------
// Alerts
// ---------------------------------------------------------------------------

export function createAlert(overrides: Partial<AlertSubscription> = {}): AlertSubscription {
  return {
    id: alertId(1),
    ownerId: 'user-1',
    trialId: null,
    diseaseArea: null,
    location: null,
    phase: null,
    filterCriteria: {},
    frequency: 'weekly',
    isActive: true,
    lastNotified: null,
    createdAt: new Date('2024-03-01T00:00:00.000Z'),
    updatedAt: new Date('2024-03-01T00:00:00.000Z'),
    ...overrides,
  }
}
