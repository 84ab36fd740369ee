import { describe, it, expect } from 'vitest'
import { parseDeadlines, parseQuantity } from '../../src/deadlines/index.js'
import type { DeadlineAnchors } from '../../src/deadlines/index.js'

function makeAnchors(overrides: Partial<DeadlineAnchors> = {}): DeadlineAnchors {
  return { agreementDate: '2025-03-28', fiscalYearEnd: '2024-12-31', ...overrides }
}

describe('parseQuantity', () => {
  it('reads digits', () => {
    expect(parseQuantity('90')).toBe(90)
  })

  it('prefers the parenthesised figure', () => {
    expect(parseQuantity('thirty (30)')).toBe(30)
    expect(parseQuantity('forty-five (45)')).toBe(45)
  })

  it('reads number words', () => {
    expect(parseQuantity('forty-five')).toBe(45)
    expect(parseQuantity('one hundred twenty')).toBe(120)
    expect(parseQuantity('ten')).toBe(10)
  })

  it('returns null for words that are not numbers', () => {
    expect(parseQuantity('several')).toBeNull()
  })
})

describe('parseDeadlines: explicit dates', () => {
  it('reads month-name, day-first, ISO and US formats', () => {
    const text = 'Deliver by March 31, 2025, by the 30th day of June, 2025, by 2025-09-30 and by 12/31/2025.'
    const { descriptors, skipped } = parseDeadlines(text, makeAnchors())
    expect(descriptors.map((d) => (d.kind === 'absolute' ? d.date : d.period))).toEqual([
      '2025-03-31',
      '2025-06-30',
      '2025-09-30',
      '2025-12-31',
    ])
    expect(descriptors.every((d) => d.kind === 'absolute' && d.basis === 'explicit')).toBe(true)
    expect(skipped).toEqual([])
  })

  it('records the source phrase and its offsets', () => {
    const text = 'Deliver by Mar. 31st 2025.'
    const [descriptor] = parseDeadlines(text, makeAnchors()).descriptors
    expect(descriptor).toEqual({
      kind: 'absolute',
      date: '2025-03-31',
      basis: 'explicit',
      anchor: null,
      offset: null,
      sourceText: 'Mar. 31st 2025',
      start: 11,
      end: 25,
    })
  })

  it('skips an impossible calendar date', () => {
    const text = 'The Borrower shall pay the fee on February 30, 2025.'
    const result = parseDeadlines(text, makeAnchors())
    expect(result.descriptors).toEqual([])
    expect(result.skipped).toEqual([
      { sourceText: 'February 30, 2025', start: 34, end: 51, reason: 'not a valid calendar date' },
    ])
  })
})

describe('parseDeadlines: relative offsets', () => {
  it('resolves days after fiscal year end to an absolute date', () => {
    const text = 'Borrower shall deliver audited financial statements within 90 days after each fiscal year end.'
    const result = parseDeadlines(text, makeAnchors())
    expect(result.descriptors).toEqual([
      {
        kind: 'absolute',
        date: '2025-03-31',
        basis: 'relative',
        anchor: 'fiscal-year-end',
        offset: { amount: 90, unit: 'days' },
        sourceText: 'within 90 days after each fiscal year end',
        start: 52,
        end: 93,
      },
    ])
    expect(result.skipped).toEqual([])
    expect(result.eventTriggered).toBe(false)
    expect(result.impliedPeriods).toEqual(['annual'])
  })

  it('counts the offset from an explicit anchor date', () => {
    const text = 'Borrower shall deliver the survey within 30 days after December 31, 2025.'
    const result = parseDeadlines(text, makeAnchors())
    expect(result.descriptors).toEqual([
      {
        kind: 'absolute',
        date: '2026-01-30',
        basis: 'relative',
        anchor: null,
        offset: { amount: 30, unit: 'days' },
        sourceText: 'within 30 days after December 31, 2025',
        start: 34,
        end: 72,
      },
    ])
    expect(result.skipped).toEqual([])
    expect(result.impliedPeriods).toEqual([])
  })

  it('keeps a separate explicit date next to a dated anchor', () => {
    const text = 'Borrower shall deliver the survey by June 30, 2025 and the title report within 10 days after the March 1, 2025 closing.'
    const dates = parseDeadlines(text, makeAnchors()).descriptors.map((d) => (d.kind === 'absolute' ? d.date : d.period))
    expect(dates).toEqual(['2025-06-30', '2025-03-11'])
  })

  it('uses business-day arithmetic when the clause says business days', () => {
    const text = 'The Borrower shall deliver a compliance certificate within ten (10) Business Days after the Closing Date.'
    const [descriptor] = parseDeadlines(text, makeAnchors()).descriptors
    expect(descriptor.kind).toBe('absolute')
    if (descriptor.kind === 'absolute') {
      expect(descriptor.date).toBe('2025-04-11')
      expect(descriptor.anchor).toBe('agreement-date')
      expect(descriptor.offset).toEqual({ amount: 10, unit: 'business-days' })
      expect(descriptor.sourceText).toBe('within ten (10) Business Days after the Closing Date')
    }
  })

  it('counts calendar days for a bare "days"', () => {
    const text = 'The Borrower shall deliver a compliance certificate within ten (10) days after the Closing Date.'
    const [descriptor] = parseDeadlines(text, makeAnchors()).descriptors
    expect(descriptor.kind === 'absolute' && descriptor.date).toBe('2025-04-07')
  })

  it('lets the day-count mode decide what a bare "days" means', () => {
    const text = 'The Borrower shall deliver a compliance certificate within ten (10) days after the Closing Date.'
    const [descriptor] = parseDeadlines(text, makeAnchors(), { defaultDayCount: 'business' }).descriptors
    expect(descriptor.kind === 'absolute' && descriptor.date).toBe('2025-04-11')
  })

  it('keeps explicit calendar days in business mode', () => {
    const text = 'The Borrower shall deliver a compliance certificate within ten (10) calendar days after the Closing Date.'
    const [descriptor] = parseDeadlines(text, makeAnchors(), { defaultDayCount: 'business' }).descriptors
    expect(descriptor.kind === 'absolute' && descriptor.date).toBe('2025-04-07')
  })

  it('turns a quarter anchor into a recurrence carrying the offset', () => {
    const text = 'The Borrower shall deliver quarterly financial statements within 45 days after the end of each fiscal quarter.'
    const { descriptors } = parseDeadlines(text, makeAnchors())
    expect(descriptors).toHaveLength(1)
    expect(descriptors[0]).toMatchObject({
      kind: 'recurrence',
      period: 'quarterly',
      anchor: 'fiscal-year-end',
      anchorDate: '2024-12-31',
      offset: { amount: 45, unit: 'days' },
      sourceText: 'within 45 days after the end of each fiscal quarter',
    })
  })

  it('flags an event anchor without producing a descriptor', () => {
    const text = 'The Borrower shall notify the Agent within five Business Days after the occurrence of any Default.'
    const result = parseDeadlines(text, makeAnchors())
    expect(result.descriptors).toEqual([])
    expect(result.skipped).toEqual([])
    expect(result.eventTriggered).toBe(true)
  })

  it('skips an agreement-date offset when no agreement date is supplied', () => {
    const text = 'The Borrower shall deliver the title policy within 30 days after the Closing Date.'
    const result = parseDeadlines(text, makeAnchors({ agreementDate: null }))
    expect(result.descriptors).toEqual([])
    expect(result.skipped).toEqual([
      {
        sourceText: 'within 30 days after the Closing Date',
        start: 44,
        end: 81,
        reason: 'agreement date not supplied',
      },
    ])
  })

  it('skips an unrecognised anchor', () => {
    const text = 'The Borrower shall deliver the report within 30 days after completion of the audit.'
    const result = parseDeadlines(text, makeAnchors())
    expect(result.descriptors).toEqual([])
    expect(result.skipped).toHaveLength(1)
    expect(result.skipped[0].reason).toBe('unrecognized anchor "completion of the audit"')
    expect(result.skipped[0].sourceText).toBe('within 30 days after completion of the audit')
  })

  it('skips an unparseable quantity', () => {
    const text = 'The Borrower shall deliver the survey within several days after the Closing Date.'
    const result = parseDeadlines(text, makeAnchors())
    expect(result.descriptors).toEqual([])
    expect(result.skipped.map((s) => s.reason)).toEqual(['unparseable quantity "several"'])
  })
})

describe('parseDeadlines: recurrence phrases', () => {
  it('reads a quarterly test anchored at fiscal year end', () => {
    const text = 'The Borrower shall maintain a Debt Service Coverage Ratio of at least 1.25:1.0, tested quarterly.'
    const { descriptors } = parseDeadlines(text, makeAnchors())
    expect(descriptors).toEqual([
      {
        kind: 'recurrence',
        period: 'quarterly',
        anchor: 'fiscal-year-end',
        anchorDate: '2024-12-31',
        offset: null,
        sourceText: 'quarterly',
        start: 87,
        end: 96,
      },
    ])
  })

  it('does not read "semi-annually" as "annually"', () => {
    const text = 'The Borrower shall deliver rent rolls semi-annually and annual budgets annually.'
    const { descriptors } = parseDeadlines(text, makeAnchors())
    expect(descriptors.map((d) => (d.kind === 'recurrence' ? d.period : d.date))).toEqual(['semi-annual', 'annual'])
    expect(descriptors.map((d) => d.sourceText)).toEqual(['semi-annually', 'annual'])
  })

  it('anchors on the agreement date when the clause counts from closing', () => {
    const text = 'The Borrower shall pay the agency fee annually from the Closing Date.'
    const { descriptors } = parseDeadlines(text, makeAnchors({ agreementDate: '2024-06-15' }))
    expect(descriptors).toHaveLength(1)
    expect(descriptors[0]).toMatchObject({ kind: 'recurrence', period: 'annual', anchor: 'agreement-date', anchorDate: '2024-06-15' })
  })

  it('skips an agreement-anchored recurrence without an agreement date', () => {
    const text = 'The Borrower shall pay the agency fee annually from the Closing Date.'
    const result = parseDeadlines(text, makeAnchors({ agreementDate: null }))
    expect(result.descriptors).toEqual([])
    expect(result.skipped).toEqual([
      { sourceText: 'annually', start: 38, end: 46, reason: 'agreement date not supplied' },
    ])
  })

  it('returns both families when a clause has a fixed date and a recurrence', () => {
    const text = 'The Borrower shall deliver a budget by January 31, 2025 and monthly reports thereafter.'
    const { descriptors } = parseDeadlines(text, makeAnchors())
    expect(descriptors.map((d) => d.kind)).toEqual(['absolute', 'recurrence'])
  })

  it('returns nothing for a clause without date phrases', () => {
    const result = parseDeadlines('Borrower shall notify Lender promptly of any material adverse change.', makeAnchors())
    expect(result.descriptors).toEqual([])
    expect(result.skipped).toEqual([])
    expect(result.eventTriggered).toBe(true)
  })
})
