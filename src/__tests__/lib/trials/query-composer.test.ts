import { buildPredicates, composeSearchPlan } from '@/lib/trials/query-composer'
import { createFilterSpec } from '@/__tests__/utils/factories'

describe('buildPredicates', () => {
  it('returns no predicates for an empty filter spec', () => {
    expect(buildPredicates(createFilterSpec())).toEqual([])
  })

  it('emits one predicate per supplied filter in a fixed order', () => {
    const spec = createFilterSpec({
      sponsor: 'Acme',
      location: 'Boston',
      statuses: ['Recruiting'],
      phases: ['Phase 1', 'Phase 3'],
      diseaseAreas: ['Oncology'],
      keyword: 'immunotherapy',
    })

    expect(buildPredicates(spec)).toEqual([
      { kind: 'text-match', keyword: 'immunotherapy' },
      { kind: 'disease-area-in', values: ['Oncology'] },
      { kind: 'phase-in', values: ['Phase 1', 'Phase 3'] },
      { kind: 'status-in', values: ['Recruiting'] },
      { kind: 'site-location-contains', value: 'Boston' },
      { kind: 'sponsor-contains', value: 'Acme' },
    ])
  })
})

describe('composeSearchPlan', () => {
  it('shares one predicate list between the page and count plans', () => {
    const plan = composeSearchPlan(
      createFilterSpec({ keyword: 'asthma', phases: ['Phase 2'] }),
      null
    )

    expect(plan.pageQuery.predicates).toBe(plan.countQuery.predicates)
    expect(plan.countQuery).toEqual({ predicates: plan.pageQuery.predicates })
  })

  it('derives the offset from page and limit', () => {
    const plan = composeSearchPlan(createFilterSpec({ page: 3, limit: 10 }), null)

    expect(plan.pageQuery.page).toBe(3)
    expect(plan.pageQuery.limit).toBe(10)
    expect(plan.pageQuery.offset).toBe(20)
  })

  it('ranks by the keyword and projects the viewer saved flag', () => {
    const plan = composeSearchPlan(createFilterSpec({ keyword: 'asthma' }), 'user-1')

    expect(plan.pageQuery.relevance).toEqual({ kind: 'text-rank', keyword: 'asthma' })
    expect(plan.pageQuery.savedFlag).toEqual({ kind: 'viewer-saved', viewerId: 'user-1' })
    expect(plan.pageQuery.ordering).toEqual([
      { key: 'relevance', direction: 'desc' },
      { key: 'created_at', direction: 'desc' },
      { key: 'id', direction: 'asc' },
    ])
  })

  it('uses constant projections for an anonymous search without keyword', () => {
    const plan = composeSearchPlan(createFilterSpec(), null)

    expect(plan.pageQuery.relevance).toEqual({ kind: 'constant-zero' })
    expect(plan.pageQuery.savedFlag).toEqual({ kind: 'constant-false' })
  })
})
