/**
 * Zod schemas for pipeline runs: per-run options, diagnostics, and results.
 */

import { z } from 'zod'
import { ISODateSchema, SpanSchema } from '../common/index.js'
import { PortfolioSummarySchema, TrackedObligationSchema } from '../obligations/index.js'

export const RunOptionsSchema = z
  .object({
    /** As-of date for compliance status. Defaults to today (UTC). */
    referenceDate: ISODateSchema.optional(),
    dueSoonWindowDays: z.number().int().nonnegative().optional(),
    agreementDate: ISODateSchema.nullable().optional(),
    /** A concrete fiscal year end. Defaults to the configured MM-DD on or before the reference date. */
    fiscalYearEnd: ISODateSchema.optional(),
  })
  .strict()
export type RunOptions = z.input<typeof RunOptionsSchema>

export const DiagnosticSchema = z.object({
  code: z.enum(['DATE_ARITHMETIC_ERROR', 'POSSIBLE_FALSE_ATTACHMENT']),
  stage: z.enum(['segment', 'classify', 'deadline', 'risk', 'compliance']),
  obligationId: z.string().nullable(),
  /** Clause span in document offsets. */
  span: SpanSchema,
  excerpt: z.string(),
  message: z.string(),
})
export type Diagnostic = z.infer<typeof DiagnosticSchema>

export const RunStatsSchema = z.object({
  clauses: z.number().int().nonnegative(),
  fragments: z.number().int().nonnegative(),
  unmatched: z.number().int().nonnegative(),
  duplicates: z.number().int().nonnegative(),
  obligations: z.number().int().nonnegative(),
  skippedDeadlines: z.number().int().nonnegative(),
})
export type RunStats = z.infer<typeof RunStatsSchema>

export const PipelineResultSchema = z.object({
  referenceDate: ISODateSchema,
  fiscalYearEnd: ISODateSchema,
  agreementDate: ISODateSchema.nullable(),
  dueSoonWindowDays: z.number().int().nonnegative(),
  obligations: z.array(TrackedObligationSchema),
  summary: PortfolioSummarySchema,
  diagnostics: z.array(DiagnosticSchema),
  stats: RunStatsSchema,
})
export type PipelineResult = z.infer<typeof PipelineResultSchema>

export const EXPORT_VERSION = 1

export const ObligationExportSchema = PipelineResultSchema.extend({
  version: z.literal(EXPORT_VERSION),
})
export type ObligationExport = z.infer<typeof ObligationExportSchema>
