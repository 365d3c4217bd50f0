/**
 * Tests for the PostgreSQL repositories against a recorded query client
 */

import { DataTransformError, IntegrityError, QueryError } from '@/lib/errors'
import { PgAlertRepository } from '@/lib/trials/pg/alert-repository'
import { PgInterestRepository } from '@/lib/trials/pg/interest-repository'
import { PgSavedTrialRepository } from '@/lib/trials/pg/saved-trial-repository'
import { PgTrialRepository } from '@/lib/trials/pg/trial-repository'
import { composeSearchPlan } from '@/lib/trials/query-composer'
import { alertId, createFilterSpec, trialId } from '@/__tests__/utils/factories'
import { RecordingExecutor, squish } from '@/__tests__/utils/mocks'

const CREATED = new Date('2024-05-01T10:00:00.000Z')

function alertRow(overrides: Record<string, unknown> = {}) {
  return {
    id: alertId(1),
    user_id: 'user-1',
    trial_id: null,
    disease_area: 'Oncology',
    location: null,
    phase: null,
    filter_criteria: { age: { min: 18 } },
    alert_frequency: 'weekly',
    is_active: true,
    last_notified: null,
    created_at: CREATED,
    updated_at: CREATED,
    ...overrides,
  }
}

describe('PgTrialRepository', () => {
  it('maps search rows, coercing numeric strings', async () => {
    const executor = new RecordingExecutor().respondWith([
      {
        id: trialId(1),
        nct_id: 'NCT01',
        title: 'Asthma Study',
        disease_area: 'Respiratory',
        phase: 'Phase 2',
        status: 'Recruiting',
        sponsor: 'Acme',
        enrollment: '150',
        created_at: CREATED,
        location: 'Boston, USA',
        is_saved: true,
        rank: '0.5',
      },
    ])
    const repository = new PgTrialRepository(executor)
    const plan = composeSearchPlan(createFilterSpec({ keyword: 'asthma' }), 'user-1')

    const [row] = await repository.fetchPage(plan.pageQuery)

    expect(row).toEqual({
      id: trialId(1),
      nctId: 'NCT01',
      title: 'Asthma Study',
      diseaseArea: 'Respiratory',
      phase: 'Phase 2',
      status: 'Recruiting',
      sponsor: 'Acme',
      location: 'Boston, USA',
      enrollment: 150,
      isSaved: true,
      rank: 0.5,
      createdAt: CREATED,
    })
    expect(executor.lastCall.values).toEqual(['asthma', 'user-1', 20, 0])
  })

  it('reads the bigint count', async () => {
    const executor = new RecordingExecutor().respondWith([{ count: '42' }])
    const repository = new PgTrialRepository(executor)

    await expect(repository.count({ predicates: [] })).resolves.toBe(42)
  })

  it('returns null for a missing trial without loading sites', async () => {
    const executor = new RecordingExecutor().respondWith([])
    const repository = new PgTrialRepository(executor)

    await expect(repository.findById(trialId(9))).resolves.toBeNull()
    expect(executor.calls).toHaveLength(1)
    expect(executor.calls[0]?.values).toEqual([trialId(9)])
  })

  it('loads the trial with its sites', async () => {
    const executor = new RecordingExecutor().respondWith(
      [
        {
          id: trialId(1),
          nct_id: null,
          title: 'Asthma Study',
          summary: 'Inhaled therapy',
          disease_area: 'Respiratory',
          phase: 'Phase 2',
          status: 'Recruiting',
          sponsor: 'Acme',
          eligibility_criteria: 'Adults',
          enrollment: 10,
          max_enrollment: 50,
          start_date: '2024-01-15',
          estimated_completion: null,
          metadata: { interest_count: 2 },
          location: 'Boston, USA',
          created_at: CREATED,
          updated_at: CREATED,
        },
      ],
      [
        {
          id: 'site-1',
          site_name: 'General Hospital',
          country: 'USA',
          city: 'Boston',
          address: null,
          contact_email: 'coordinator@example.org',
          contact_phone: null,
          is_recruiting: true,
        },
      ]
    )
    const repository = new PgTrialRepository(executor)

    const trial = await repository.findById(trialId(1))

    expect(trial?.metadata).toEqual({ interest_count: 2 })
    expect(trial?.startDate).toBe('2024-01-15')
    expect(trial?.maxEnrollment).toBe(50)
    expect(trial?.sites).toEqual([
      {
        id: 'site-1',
        siteName: 'General Hospital',
        country: 'USA',
        city: 'Boston',
        address: null,
        contactEmail: 'coordinator@example.org',
        contactPhone: null,
        isRecruiting: true,
      },
    ])
    expect(squish(executor.lastCall.text)).toContain('ORDER BY country ASC, city ASC, site_name ASC')
  })

  it('rejects a trial whose metadata is not a JSON object', async () => {
    const executor = new RecordingExecutor().respondWith(
      [{ id: trialId(1), title: 'Broken', metadata: 'not-an-object', created_at: CREATED, updated_at: CREATED }],
      []
    )
    const repository = new PgTrialRepository(executor)

    await expect(repository.findById(trialId(1))).rejects.toBeInstanceOf(DataTransformError)
  })

  it('returns the incremented interest count, or null when the trial is missing', async () => {
    const executor = new RecordingExecutor().respondWith([{ interest_count: 3 }], [])
    const repository = new PgTrialRepository(executor)

    await expect(repository.incrementInterestCount(trialId(1))).resolves.toBe(3)
    await expect(repository.incrementInterestCount(trialId(2))).resolves.toBeNull()
  })

  it('wraps driver failures', async () => {
    const executor = new RecordingExecutor().respondWith(new Error('syntax error at or near "x"'))
    const repository = new PgTrialRepository(executor)

    await expect(repository.count({ predicates: [] })).rejects.toBeInstanceOf(QueryError)
  })
})

describe('PgSavedTrialRepository', () => {
  it('reports whether the save inserted a row', async () => {
    const executor = new RecordingExecutor().respondWith([{ inserted: 1 }], [])
    const repository = new PgSavedTrialRepository(executor)

    await expect(repository.insert('user-1', trialId(1), 'call back')).resolves.toBe(true)
    await expect(repository.insert('user-1', trialId(1), null)).resolves.toBe(false)
    expect(executor.calls[0]?.values).toEqual(['user-1', trialId(1), 'call back'])
    expect(squish(executor.calls[0]?.text ?? '')).toContain('ON CONFLICT (user_id, trial_id) DO NOTHING')
  })

  it('surfaces an unknown trial as a foreign key violation', async () => {
    const executor = new RecordingExecutor().respondWith(
      Object.assign(new Error('insert or update violates foreign key constraint'), {
        code: '23503',
        constraint: 'trial_saves_trial_id_fkey',
      })
    )
    const repository = new PgSavedTrialRepository(executor)

    const error = await repository.insert('user-1', trialId(1), null).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(IntegrityError)
    expect(error).toMatchObject({ violation: 'foreign_key', constraint: 'trial_saves_trial_id_fkey' })
  })

  it('reads the saved flag', async () => {
    const executor = new RecordingExecutor().respondWith([{ saved: true }], [])
    const repository = new PgSavedTrialRepository(executor)

    await expect(repository.isSaved('user-1', trialId(1))).resolves.toBe(true)
    await expect(repository.isSaved('user-1', trialId(2))).resolves.toBe(false)
  })

  it('lists saves newest first', async () => {
    const executor = new RecordingExecutor().respondWith([
      {
        id: trialId(1),
        nct_id: null,
        title: 'Asthma Study',
        disease_area: null,
        phase: null,
        status: null,
        sponsor: null,
        enrollment: null,
        location: null,
        notes: 'ask doctor',
        saved_at: CREATED,
      },
    ])
    const repository = new PgSavedTrialRepository(executor)

    const saved = await repository.listForViewer('user-1')

    expect(saved).toHaveLength(1)
    expect(saved[0]).toMatchObject({ id: trialId(1), notes: 'ask doctor', savedAt: CREATED })
    expect(squish(executor.lastCall.text)).toContain('ORDER BY sv.saved_at DESC, t.trial_id ASC')
  })
})

describe('PgAlertRepository', () => {
  it('inserts with serialized filter criteria', async () => {
    const executor = new RecordingExecutor().respondWith([alertRow()])
    const repository = new PgAlertRepository(executor)

    const created = await repository.insert('user-1', {
      trialId: null,
      diseaseArea: 'Oncology',
      location: null,
      phase: null,
      filterCriteria: { age: { min: 18 } },
      frequency: 'weekly',
    })

    expect(executor.lastCall.values).toEqual([
      'user-1',
      null,
      'Oncology',
      null,
      null,
      '{"age":{"min":18}}',
      'weekly',
    ])
    expect(created).toMatchObject({
      id: alertId(1),
      ownerId: 'user-1',
      filterCriteria: { age: { min: 18 } },
      frequency: 'weekly',
      isActive: true,
    })
  })

  it('updates only the supplied fields, scoped by owner', async () => {
    const executor = new RecordingExecutor().respondWith([alertRow({ phase: 'Phase 3', is_active: false })])
    const repository = new PgAlertRepository(executor)

    const updated = await repository.update('user-1', alertId(1), { phase: 'Phase 3', isActive: false })

    const text = squish(executor.lastCall.text)
    expect(text).toContain('SET phase = $1, is_active = $2, updated_at = NOW()')
    expect(text).toContain('WHERE alert_id = $3 AND user_id = $4')
    expect(executor.lastCall.values).toEqual(['Phase 3', false, alertId(1), 'user-1'])
    expect(updated).toMatchObject({ phase: 'Phase 3', isActive: false })
  })

  it('replaces filter criteria as jsonb', async () => {
    const executor = new RecordingExecutor().respondWith([alertRow({ filter_criteria: { tags: ['a'] } })])
    const repository = new PgAlertRepository(executor)

    await repository.update('user-1', alertId(1), { filterCriteria: { tags: ['a'] } })

    expect(squish(executor.lastCall.text)).toContain('SET filter_criteria = $1::jsonb')
    expect(executor.lastCall.values[0]).toBe('{"tags":["a"]}')
  })

  it('returns null when no owned alert matched', async () => {
    const executor = new RecordingExecutor().respondWith([])
    const repository = new PgAlertRepository(executor)

    await expect(repository.update('user-2', alertId(1), { frequency: 'daily' })).resolves.toBeNull()
  })

  it('refuses an update without fields', async () => {
    const executor = new RecordingExecutor()
    const repository = new PgAlertRepository(executor)

    await expect(repository.update('user-1', alertId(1), {})).rejects.toThrow(
      'Alert update requires at least one field'
    )
    expect(executor.calls).toHaveLength(0)
  })

  it('deletes by id and owner', async () => {
    const executor = new RecordingExecutor().respondWith([{ removed: 1 }], [])
    const repository = new PgAlertRepository(executor)

    await expect(repository.remove('user-1', alertId(1))).resolves.toBe(true)
    await expect(repository.remove('user-2', alertId(1))).resolves.toBe(false)
    expect(executor.calls[1]?.values).toEqual([alertId(1), 'user-2'])
  })

  it('rejects a stored frequency outside the allowed set', async () => {
    const executor = new RecordingExecutor().respondWith([alertRow({ alert_frequency: 'hourly' })])
    const repository = new PgAlertRepository(executor)

    await expect(repository.listForOwner('user-1')).rejects.toBeInstanceOf(DataTransformError)
  })
})

describe('PgInterestRepository', () => {
  it('inserts and maps the interest', async () => {
    const executor = new RecordingExecutor().respondWith([
      { id: 'interest-1', trial_id: trialId(1), user_id: 'user-1', message: null, created_at: CREATED },
    ])
    const repository = new PgInterestRepository(executor)

    await expect(repository.insert('user-1', trialId(1), null)).resolves.toEqual({
      id: 'interest-1',
      trialId: trialId(1),
      userId: 'user-1',
      message: null,
      createdAt: CREATED,
    })
    expect(executor.lastCall.values).toEqual(['user-1', trialId(1), null])
  })
})
