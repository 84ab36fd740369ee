import { describe, it, expect } from 'vitest'
import { selectHighRisk, selectUpcoming, summarize } from '../../src/compliance/index.js'
import type { Obligation } from '../../src/obligations/index.js'

let counter = 0

function makeObligation(overrides: Partial<Obligation> = {}): Obligation {
  counter++
  return {
    id: `00000000-0000-5000-8000-${String(counter).padStart(12, '0')}`,
    category: 'reporting-requirement',
    description: 'Borrower shall deliver audited financial statements annually.',
    span: { start: 0, end: 62 },
    marker: null,
    responsibleParty: 'Borrower',
    matchedRuleIds: ['rr-deliver'],
    evidence: [],
    deadlines: [],
    frequency: 'unspecified',
    reviewFlags: [],
    risk: { score: 40, tier: 'medium', signals: [], bonus: 0 },
    compliance: { status: 'not-applicable', dueDate: null, daysUntilDue: null },
    ...overrides,
  }
}

describe('summarize', () => {
  it('returns all zeros for an empty portfolio', () => {
    expect(summarize([])).toEqual({
      totalObligations: 0,
      byCategory: { 'financial-covenant': 0, 'reporting-requirement': 0, notification: 0, other: 0 },
      byStatus: { compliant: 0, 'due-soon': 0, missed: 0, 'not-applicable': 0 },
      byRiskTier: { low: 0, medium: 0, high: 0 },
      overallRiskIndex: 0,
      missedCount: 0,
      dueSoonCount: 0,
      highRiskCount: 0,
    })
  })

  it('counts by category, status and tier', () => {
    const summary = summarize([
      makeObligation({
        category: 'financial-covenant',
        risk: { score: 85, tier: 'high', signals: ['default'], bonus: 30 },
        compliance: { status: 'missed', dueDate: '2025-03-31', daysUntilDue: -5 },
      }),
      makeObligation({ compliance: { status: 'due-soon', dueDate: '2025-04-07', daysUntilDue: 2 } }),
      makeObligation({
        category: 'notification',
        risk: { score: 30, tier: 'low', signals: [], bonus: 0 },
      }),
    ])

    expect(summary.totalObligations).toBe(3)
    expect(summary.byCategory).toEqual({ 'financial-covenant': 1, 'reporting-requirement': 1, notification: 1, other: 0 })
    expect(summary.byStatus).toEqual({ compliant: 0, 'due-soon': 1, missed: 1, 'not-applicable': 1 })
    expect(summary.byRiskTier).toEqual({ low: 1, medium: 1, high: 1 })
    expect(summary.missedCount).toBe(1)
    expect(summary.dueSoonCount).toBe(1)
    expect(summary.highRiskCount).toBe(1)
  })

  it('averages scores into the risk index, rounded to two decimals', () => {
    const summary = summarize([
      makeObligation({ risk: { score: 55, tier: 'medium', signals: [], bonus: 0 } }),
      makeObligation({ risk: { score: 36, tier: 'medium', signals: [], bonus: 6 } }),
      makeObligation({ risk: { score: 40, tier: 'medium', signals: [], bonus: 0 } }),
    ])
    expect(summary.overallRiskIndex).toBe(43.67)
  })
})

describe('selectHighRisk', () => {
  it('keeps only high-tier obligations in order', () => {
    const high1 = makeObligation({ risk: { score: 70, tier: 'high', signals: [], bonus: 15 } })
    const medium = makeObligation()
    const high2 = makeObligation({ risk: { score: 90, tier: 'high', signals: [], bonus: 30 } })
    expect(selectHighRisk([high1, medium, high2])).toEqual([high1, high2])
  })
})

describe('selectUpcoming', () => {
  const later = makeObligation({ compliance: { status: 'compliant', dueDate: '2025-05-15', daysUntilDue: 30 } })
  const soon = makeObligation({ compliance: { status: 'due-soon', dueDate: '2025-04-17', daysUntilDue: 2 } })
  const missed = makeObligation({ compliance: { status: 'missed', dueDate: '2025-04-01', daysUntilDue: -14 } })
  const none = makeObligation()

  it('lists future deadlines soonest first', () => {
    expect(selectUpcoming([later, missed, none, soon])).toEqual([soon, later])
  })

  it('limits to a horizon when given', () => {
    expect(selectUpcoming([later, soon], 7)).toEqual([soon])
  })
})
