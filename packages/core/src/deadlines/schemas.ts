/**
 * Zod schemas for deadline descriptors attached to obligations.
 */

import { z } from 'zod'
import { ISODateSchema } from '../common/index.js'

// ── Enums ──

export const RecurrencePeriodSchema = z.enum(['monthly', 'quarterly', 'semi-annual', 'annual'])
export type RecurrencePeriod = z.infer<typeof RecurrencePeriodSchema>

export const PERIOD_MONTHS: Record<RecurrencePeriod, number> = {
  monthly: 1,
  quarterly: 3,
  'semi-annual': 6,
  annual: 12,
}

export const OffsetUnitSchema = z.enum(['days', 'business-days', 'weeks', 'months'])
export type OffsetUnit = z.infer<typeof OffsetUnitSchema>

export const DeadlineAnchorSchema = z.enum(['agreement-date', 'fiscal-year-end'])
export type DeadlineAnchor = z.infer<typeof DeadlineAnchorSchema>

export const DayCountModeSchema = z.enum(['calendar', 'business'])
export type DayCountMode = z.infer<typeof DayCountModeSchema>

// ── Descriptors ──

export const DeadlineOffsetSchema = z.object({
  amount: z.number().int().nonnegative(),
  unit: OffsetUnitSchema,
})
export type DeadlineOffset = z.infer<typeof DeadlineOffsetSchema>

/** Phrase that produced the descriptor; offsets are relative to the clause text. */
const SourcePhraseShape = {
  sourceText: z.string(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
}

export const AbsoluteDeadlineSchema = z.object({
  kind: z.literal('absolute'),
  date: ISODateSchema,
  basis: z.enum(['explicit', 'relative']),
  anchor: DeadlineAnchorSchema.nullable(),
  offset: DeadlineOffsetSchema.nullable(),
  ...SourcePhraseShape,
})
export type AbsoluteDeadline = z.infer<typeof AbsoluteDeadlineSchema>

export const RecurringDeadlineSchema = z.object({
  kind: z.literal('recurrence'),
  period: RecurrencePeriodSchema,
  anchor: DeadlineAnchorSchema,
  anchorDate: ISODateSchema,
  offset: DeadlineOffsetSchema.nullable(),
  ...SourcePhraseShape,
})
export type RecurringDeadline = z.infer<typeof RecurringDeadlineSchema>

export const DeadlineDescriptorSchema = z.discriminatedUnion('kind', [
  AbsoluteDeadlineSchema,
  RecurringDeadlineSchema,
])
export type DeadlineDescriptor = z.infer<typeof DeadlineDescriptorSchema>

// ── Parser inputs/outputs ──

/** Dates that relative phrases resolve against. Not derivable from clause text. */
export interface DeadlineAnchors {
  agreementDate: string | null
  fiscalYearEnd: string
}

export interface DeadlineParseOptions {
  /** What a bare "days" means. "business days" / "calendar days" in the text always win. */
  defaultDayCount?: DayCountMode
}

/** A date-like phrase that matched a pattern but could not be turned into a deadline. */
export interface SkippedDeadline {
  sourceText: string
  start: number
  end: number
  reason: string
}

export interface DeadlineParse {
  descriptors: DeadlineDescriptor[]
  skipped: SkippedDeadline[]
  /** True when a relative phrase was anchored on an event rather than a date. */
  eventTriggered: boolean
  /**
   * Periods named by an anchor that still resolved to one date, e.g. "90 days
   * after each fiscal year end" repeats annually.
   */
  impliedPeriods: RecurrencePeriod[]
}
