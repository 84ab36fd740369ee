/**
 * Deadline parser. Turns the date and interval phrases of one clause into
 * deadline descriptors. Three pattern families, in precedence order:
 * explicit calendar dates, relative offsets, recurrence phrases.
 * A clause may yield descriptors from several families.
 */

import { fromParts, parseISODate, toISODate } from '../dates/index.js'
import type { DayNumber } from '../dates/index.js'
import { applyOffset } from './evaluation.js'
import { parseQuantity } from './numbers.js'
import type {
  AbsoluteDeadline,
  DayCountMode,
  DeadlineAnchor,
  DeadlineAnchors,
  DeadlineParse,
  DeadlineParseOptions,
  OffsetUnit,
  RecurrencePeriod,
  RecurringDeadline,
  SkippedDeadline,
} from './schemas.js'

// ── Explicit dates ──

const MONTH_NUMBERS: Record<string, number> = {
  january: 1, jan: 1, february: 2, feb: 2, march: 3, mar: 3, april: 4, apr: 4, may: 5,
  june: 6, jun: 6, july: 7, jul: 7, august: 8, aug: 8, september: 9, sept: 9, sep: 9,
  october: 10, oct: 10, november: 11, nov: 11, december: 12, dec: 12,
}

const MONTH = '(january|february|march|april|may|june|july|august|september|october|november|december|jan|feb|mar|apr|jun|jul|aug|sept|sep|oct|nov|dec)\\.?'

interface DatePattern {
  re: RegExp
  toParts: (m: RegExpMatchArray) => [year: number, month: number, day: number]
}

const EXPLICIT_DATE_PATTERNS: DatePattern[] = [
  {
    // March 31, 2025 / Mar. 31st 2025
    re: new RegExp(`\\b${MONTH}\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})\\b`, 'gi'),
    toParts: (m) => [parseInt(m[3], 10), MONTH_NUMBERS[m[1].toLowerCase()], parseInt(m[2], 10)],
  },
  {
    // 31 March 2025 / 31st day of March, 2025
    re: new RegExp(`\\b(\\d{1,2})(?:st|nd|rd|th)?\\s+(?:day\\s+of\\s+)?${MONTH},?\\s+(\\d{4})\\b`, 'gi'),
    toParts: (m) => [parseInt(m[3], 10), MONTH_NUMBERS[m[2].toLowerCase()], parseInt(m[1], 10)],
  },
  {
    re: /\b(\d{4})-(\d{2})-(\d{2})\b/g,
    toParts: (m) => [parseInt(m[1], 10), parseInt(m[2], 10), parseInt(m[3], 10)],
  },
  {
    // US order: 03/31/2025
    re: /\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/g,
    toParts: (m) => [parseInt(m[3], 10), parseInt(m[1], 10), parseInt(m[2], 10)],
  },
]

// ── Relative offsets ──

const RELATIVE_RE =
  /\b(?:within|no later than|not later than|not more than)\s+([a-z0-9-]+(?:\s+[a-z-]+){0,2}?(?:\s+\(\d+\))?)\s+(?:(business|calendar)\s+)?(days?|weeks?|months?)\s+(?:after|following|of|from)\s+([^,;:.]+)/gi

type AnchorTarget =
  | { type: 'event' }
  | { type: 'recurrence'; period: RecurrencePeriod }
  | { type: 'absolute'; anchor: DeadlineAnchor }

/** Checked in order; the first rule that matches the anchor phrase wins. */
const ANCHOR_RULES: Array<{ re: RegExp; target: AnchorTarget }> = [
  { re: /\b(?:occurrence|receipt|becoming aware|knowledge|notice|request|demand)\b/i, target: { type: 'event' } },
  { re: /\bquarter(?:[- ]end)?\b/i, target: { type: 'recurrence', period: 'quarterly' } },
  { re: /\bhalf[- ]year(?:[- ]end)?\b|\bsemi-?annual\b/i, target: { type: 'recurrence', period: 'semi-annual' } },
  { re: /\bmonth(?:[- ]end)?\b/i, target: { type: 'recurrence', period: 'monthly' } },
  { re: /\byear(?:[- ]end)?\b/i, target: { type: 'absolute', anchor: 'fiscal-year-end' } },
  {
    re: /\bclosing(?: date)?\b|\bagreement date\b|\beffective date\b|\bdate hereof\b|\bdate of this agreement\b|\bexecution\b/i,
    target: { type: 'absolute', anchor: 'agreement-date' },
  },
]

// ── Recurrence phrases ──

/** Semi-annual runs first so "semi-annually" is not re-read as "annually". */
const RECURRENCE_PHRASES: Array<{ period: RecurrencePeriod; re: RegExp }> = [
  {
    period: 'semi-annual',
    re: /\bsemi-?annual(?:ly)?\b|\btwice (?:a|each|per) (?:fiscal )?year\b|\b(?:each|every) (?:fiscal )?half[- ]year\b/gi,
  },
  { period: 'quarterly', re: /\bquarterly\b|\b(?:each|every) (?:fiscal |calendar )?quarter\b/gi },
  { period: 'monthly', re: /\bmonthly\b|\b(?:each|every) (?:calendar )?month\b/gi },
  { period: 'annual', re: /\bannual(?:ly)?\b|\byearly\b|\b(?:each|every) (?:fiscal |calendar )?year\b/gi },
]

const AGREEMENT_ANCHOR_RE =
  /\b(?:from|after|following)\s+(?:the\s+)?(?:closing|agreement|effective)\s+date\b|\bfrom the date hereof\b/i

const EVENT_CUE_RE = /\bpromptly\b|\bimmediately\b|\bwithout delay\b|\bas soon as (?:practicable|possible)\b|\bupon\b/i

// ── Helpers ──

function mask(text: string, start: number, end: number): string {
  return text.slice(0, start) + ' '.repeat(end - start) + text.slice(end)
}

function resolveUnit(qualifier: string | undefined, unitWord: string, mode: DayCountMode): OffsetUnit {
  const unit = unitWord.toLowerCase()
  if (unit.startsWith('week')) return 'weeks'
  if (unit.startsWith('month')) return 'months'
  const q = qualifier?.toLowerCase()
  if (q === 'business') return 'business-days'
  if (q === 'calendar') return 'days'
  return mode === 'business' ? 'business-days' : 'days'
}

function anchorDay(anchor: DeadlineAnchor, anchors: DeadlineAnchors): DayNumber | string {
  if (anchor === 'agreement-date') {
    if (anchors.agreementDate === null) return 'agreement date not supplied'
    return parseISODate(anchors.agreementDate) ?? `agreement date is not a valid date: ${anchors.agreementDate}`
  }
  return parseISODate(anchors.fiscalYearEnd) ?? `fiscal year end is not a valid date: ${anchors.fiscalYearEnd}`
}

// ── Families ──

function parseExplicitDates(text: string, skipped: SkippedDeadline[]): AbsoluteDeadline[] {
  const candidates: Array<{ start: number; end: number; parts: [number, number, number] }> = []
  for (const pattern of EXPLICIT_DATE_PATTERNS) {
    for (const m of text.matchAll(pattern.re)) {
      const start = m.index ?? 0
      candidates.push({ start, end: start + m[0].length, parts: pattern.toParts(m) })
    }
  }
  candidates.sort((a, b) => a.start - b.start || b.end - a.end)

  const descriptors: AbsoluteDeadline[] = []
  let lastEnd = -1
  for (const c of candidates) {
    if (c.start < lastEnd) continue
    lastEnd = c.end
    const sourceText = text.slice(c.start, c.end)
    const day = fromParts(...c.parts)
    if (day === null) {
      skipped.push({ sourceText, start: c.start, end: c.end, reason: 'not a valid calendar date' })
      continue
    }
    descriptors.push({
      kind: 'absolute',
      date: toISODate(day),
      basis: 'explicit',
      anchor: null,
      offset: null,
      sourceText,
      start: c.start,
      end: c.end,
    })
  }
  return descriptors
}

interface RelativeOutcome {
  absolute: AbsoluteDeadline[]
  recurring: RecurringDeadline[]
  eventTriggered: boolean
  impliedPeriods: RecurrencePeriod[]
  /** Explicit dates read as the anchor of an offset, not as deadlines. */
  anchorDates: Set<AbsoluteDeadline>
  masked: string
}

const EACH_RE = /\b(?:each|every)\b/i

/** An explicit date that opens the anchor phrase, as in "30 days after December 31, 2025". */
function datedAnchor(text: string, anchorStart: number, explicit: AbsoluteDeadline[]): AbsoluteDeadline | undefined {
  return explicit.find((d) => d.start >= anchorStart && /^\s*(?:the\s+)?$/i.test(text.slice(anchorStart, d.start)))
}

function parseRelativeOffsets(
  text: string,
  anchors: DeadlineAnchors,
  mode: DayCountMode,
  explicit: AbsoluteDeadline[],
  skipped: SkippedDeadline[],
): RelativeOutcome {
  const outcome: RelativeOutcome = {
    absolute: [],
    recurring: [],
    eventTriggered: false,
    impliedPeriods: [],
    anchorDates: new Set(),
    masked: text,
  }

  for (const m of text.matchAll(RELATIVE_RE)) {
    const start = m.index ?? 0
    const [whole, quantityText, qualifier, unitWord, anchorText] = m
    const anchorStart = start + whole.length - anchorText.length

    const dated = datedAnchor(text, anchorStart, explicit)
    if (dated) {
      outcome.anchorDates.add(dated)
      const sourceText = text.slice(start, dated.end)
      outcome.masked = mask(outcome.masked, start, dated.end)
      const amount = parseQuantity(quantityText)
      const base = parseISODate(dated.date)
      if (amount === null || base === null) {
        skipped.push({ sourceText, start, end: dated.end, reason: `unparseable quantity "${quantityText}"` })
        continue
      }
      const offset = { amount, unit: resolveUnit(qualifier, unitWord, mode) }
      outcome.absolute.push({
        kind: 'absolute',
        date: toISODate(applyOffset(base, offset)),
        basis: 'relative',
        anchor: null,
        offset,
        sourceText,
        start,
        end: dated.end,
      })
      continue
    }

    const rule = ANCHOR_RULES.find((r) => r.re.test(anchorText))
    const keyword = rule ? rule.re.exec(anchorText) : null
    const end = keyword ? anchorStart + (keyword.index ?? 0) + keyword[0].length : anchorStart + anchorText.trimEnd().length
    const sourceText = text.slice(start, end)
    outcome.masked = mask(outcome.masked, start, end)

    if (!rule) {
      skipped.push({ sourceText, start, end, reason: `unrecognized anchor "${anchorText.trim()}"` })
      continue
    }
    if (rule.target.type === 'event') {
      outcome.eventTriggered = true
      continue
    }

    const amount = parseQuantity(quantityText)
    if (amount === null) {
      skipped.push({ sourceText, start, end, reason: `unparseable quantity "${quantityText}"` })
      continue
    }
    const offset = { amount, unit: resolveUnit(qualifier, unitWord, mode) }

    if (rule.target.type === 'recurrence') {
      const fiscal = anchorDay('fiscal-year-end', anchors)
      if (typeof fiscal === 'string') {
        skipped.push({ sourceText, start, end, reason: fiscal })
        continue
      }
      outcome.recurring.push({
        kind: 'recurrence',
        period: rule.target.period,
        anchor: 'fiscal-year-end',
        anchorDate: toISODate(fiscal),
        offset,
        sourceText,
        start,
        end,
      })
      continue
    }

    const base = anchorDay(rule.target.anchor, anchors)
    if (typeof base === 'string') {
      skipped.push({ sourceText, start, end, reason: base })
      continue
    }
    if (rule.target.anchor === 'fiscal-year-end' && EACH_RE.test(anchorText)) outcome.impliedPeriods.push('annual')
    outcome.absolute.push({
      kind: 'absolute',
      date: toISODate(applyOffset(base, offset)),
      basis: 'relative',
      anchor: rule.target.anchor,
      offset,
      sourceText,
      start,
      end,
    })
  }

  return outcome
}

function parseRecurrencePhrases(
  masked: string,
  original: string,
  anchors: DeadlineAnchors,
  skipped: SkippedDeadline[],
  taken: ReadonlySet<RecurrencePeriod>,
): RecurringDeadline[] {
  const anchor: DeadlineAnchor = AGREEMENT_ANCHOR_RE.test(masked) ? 'agreement-date' : 'fiscal-year-end'
  const found: RecurringDeadline[] = []
  let remaining = masked

  for (const { period, re } of RECURRENCE_PHRASES) {
    const hits = [...remaining.matchAll(re)]
    for (const m of hits) {
      const start = m.index ?? 0
      remaining = mask(remaining, start, start + m[0].length)
    }
    if (hits.length === 0 || taken.has(period)) continue

    const first = hits[0]
    const start = first.index ?? 0
    const end = start + first[0].length
    const sourceText = original.slice(start, end)
    const day = anchorDay(anchor, anchors)
    if (typeof day === 'string') {
      skipped.push({ sourceText, start, end, reason: day })
      continue
    }
    found.push({ kind: 'recurrence', period, anchor, anchorDate: toISODate(day), offset: null, sourceText, start, end })
  }

  return found.sort((a, b) => a.start - b.start)
}

/**
 * Parse every deadline phrase in a clause.
 * Phrases that match a pattern but cannot be resolved land in `skipped`
 * instead of failing the clause.
 */
export function parseDeadlines(
  clauseText: string,
  anchors: DeadlineAnchors,
  options: DeadlineParseOptions = {},
): DeadlineParse {
  const mode = options.defaultDayCount ?? 'calendar'
  const skipped: SkippedDeadline[] = []

  const explicit = parseExplicitDates(clauseText, skipped)
  const relative = parseRelativeOffsets(clauseText, anchors, mode, explicit, skipped)
  const taken = new Set(relative.recurring.map((r) => r.period))
  const recurring = parseRecurrencePhrases(relative.masked, clauseText, anchors, skipped, taken)

  return {
    descriptors: [
      ...explicit.filter((d) => !relative.anchorDates.has(d)),
      ...relative.absolute,
      ...[...relative.recurring, ...recurring].sort((a, b) => a.start - b.start),
    ],
    skipped: skipped.sort((a, b) => a.start - b.start),
    eventTriggered: relative.eventTriggered || EVENT_CUE_RE.test(clauseText),
    impliedPeriods: relative.impliedPeriods,
  }
}
