/**
 * Zod schemas for obligation records.
 *
 * An obligation is built in stages. Each stage spreads the previous record
 * into a new object and adds its own fields, so the types below describe
 * exactly what is known after extraction, dating, scoring, and tracking.
 */

import { z } from 'zod'
import { ISODateSchema, SpanSchema, UUIDSchema } from '../common/index.js'
import { DeadlineDescriptorSchema } from '../deadlines/index.js'

// ── Enums ──

/** Listed in classification priority order. */
export const ObligationCategorySchema = z.enum([
  'financial-covenant',
  'reporting-requirement',
  'notification',
  'other',
])
export type ObligationCategory = z.infer<typeof ObligationCategorySchema>

export const CATEGORY_PRIORITY: readonly ObligationCategory[] = ObligationCategorySchema.options

export const RiskTierSchema = z.enum(['low', 'medium', 'high'])
export type RiskTier = z.infer<typeof RiskTierSchema>

export const ComplianceStatusSchema = z.enum(['compliant', 'due-soon', 'missed', 'not-applicable'])
export type ComplianceStatus = z.infer<typeof ComplianceStatusSchema>

export const FrequencySchema = z.enum([
  'monthly',
  'quarterly',
  'semi-annual',
  'annual',
  'one-time',
  'event-based',
  'unspecified',
])
export type Frequency = z.infer<typeof FrequencySchema>

// ── Supporting shapes ──

export const EvidenceSpanSchema = z.object({
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  text: z.string(),
  ruleIds: z.array(z.string()),
})
export type EvidenceSpan = z.infer<typeof EvidenceSpanSchema>

export const ReviewFlagSchema = z.object({
  code: z.literal('possible-false-attachment'),
  detail: z.string(),
})
export type ReviewFlag = z.infer<typeof ReviewFlagSchema>

export const RiskAssessmentSchema = z.object({
  score: z.number().min(0).max(100),
  tier: RiskTierSchema,
  signals: z.array(z.string()),
  bonus: z.number().nonnegative(),
})
export type RiskAssessment = z.infer<typeof RiskAssessmentSchema>

export const ComplianceAssessmentSchema = z.object({
  status: ComplianceStatusSchema,
  dueDate: ISODateSchema.nullable(),
  daysUntilDue: z.number().int().nullable(),
})
export type ComplianceAssessment = z.infer<typeof ComplianceAssessmentSchema>

// ── Obligation stages ──

export const ExtractedObligationSchema = z.object({
  id: UUIDSchema,
  category: ObligationCategorySchema,
  description: z.string().min(1),
  span: SpanSchema,
  marker: z.string().nullable(),
  responsibleParty: z.string(),
  matchedRuleIds: z.array(z.string()),
  evidence: z.array(EvidenceSpanSchema),
})
export type ExtractedObligation = z.infer<typeof ExtractedObligationSchema>

export const DatedObligationSchema = ExtractedObligationSchema.extend({
  deadlines: z.array(DeadlineDescriptorSchema),
  frequency: FrequencySchema,
  reviewFlags: z.array(ReviewFlagSchema),
})
export type DatedObligation = z.infer<typeof DatedObligationSchema>

export const ScoredObligationSchema = DatedObligationSchema.extend({
  risk: RiskAssessmentSchema,
})
export type ScoredObligation = z.infer<typeof ScoredObligationSchema>

export const TrackedObligationSchema = ScoredObligationSchema.extend({
  compliance: ComplianceAssessmentSchema,
})
export type TrackedObligation = z.infer<typeof TrackedObligationSchema>

/** The fully enriched record handed to presentation collaborators. */
export type Obligation = TrackedObligation

// ── Portfolio roll-up ──

const CountSchema = z.number().int().nonnegative()

export const PortfolioSummarySchema = z.object({
  totalObligations: CountSchema,
  byCategory: z.object({
    'financial-covenant': CountSchema,
    'reporting-requirement': CountSchema,
    notification: CountSchema,
    other: CountSchema,
  }),
  byStatus: z.object({
    compliant: CountSchema,
    'due-soon': CountSchema,
    missed: CountSchema,
    'not-applicable': CountSchema,
  }),
  byRiskTier: z.object({
    low: CountSchema,
    medium: CountSchema,
    high: CountSchema,
  }),
  overallRiskIndex: z.number().min(0).max(100),
  missedCount: CountSchema,
  dueSoonCount: CountSchema,
  highRiskCount: CountSchema,
})
export type PortfolioSummary = z.infer<typeof PortfolioSummarySchema>
