/**
 * Zod schemas for the pipeline configuration: rule tables, scoring weights
 * and thresholds.
 */

import { z } from 'zod'
import { MonthDaySchema } from '../common/index.js'
import { DayCountModeSchema } from '../deadlines/index.js'
import { ObligationCategorySchema } from '../obligations/index.js'

const PatternSchema = z.string().min(1, 'Pattern cannot be empty')

export const CategoryRuleSchema = z.object({
  id: z.string().min(1, 'Rule id is required'),
  category: ObligationCategorySchema,
  patterns: z.array(PatternSchema).min(1, 'A rule needs at least one pattern'),
  exclusions: z.array(PatternSchema).default([]),
})
export type CategoryRule = z.infer<typeof CategoryRuleSchema>

export const SeveritySignalSchema = z.object({
  id: z.string().min(1, 'Signal id is required'),
  pattern: PatternSchema,
  weight: z.number().nonnegative(),
})
export type SeveritySignal = z.infer<typeof SeveritySignalSchema>

const ScoreSchema = z.number().min(0).max(100)

export const BaseScoresSchema = z.object({
  'financial-covenant': ScoreSchema,
  'reporting-requirement': ScoreSchema,
  notification: ScoreSchema,
  other: ScoreSchema,
})
export type BaseScores = z.infer<typeof BaseScoresSchema>

export const RiskTierThresholdsSchema = z.object({
  /** Scores up to and including this value are low. */
  lowMax: ScoreSchema,
  /** Scores above lowMax up to and including this value are medium; the rest are high. */
  mediumMax: ScoreSchema,
})
export type RiskTierThresholds = z.infer<typeof RiskTierThresholdsSchema>

function invalidPattern(source: string): string | null {
  try {
    new RegExp(source, 'i')
    return null
  } catch (e) {
    return (e as Error).message
  }
}

export const PipelineConfigSchema = z
  .object({
    categoryRules: z.array(CategoryRuleSchema).min(1, 'At least one category rule is required'),
    severitySignals: z.array(SeveritySignalSchema).default([]),
    severityBonusCap: z.number().nonnegative(),
    baseScores: BaseScoresSchema,
    riskTiers: RiskTierThresholdsSchema,
    dueSoonWindowDays: z.number().int().nonnegative(),
    defaultDayCount: DayCountModeSchema.default('calendar'),
    minClauseTokens: z.number().int().min(1).default(5),
    dedupeClauses: z.boolean().default(true),
    fiscalYearEnd: MonthDaySchema.default('12-31'),
  })
  .superRefine((data, ctx) => {
    for (const category of ObligationCategorySchema.options) {
      if (!data.categoryRules.some((r) => r.category === category)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `No category rule for "${category}"`,
          path: ['categoryRules'],
        })
      }
    }

    const ruleIds = new Set<string>()
    data.categoryRules.forEach((rule, i) => {
      if (ruleIds.has(rule.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate rule id "${rule.id}"`, path: ['categoryRules', i, 'id'] })
      }
      ruleIds.add(rule.id)
      for (const [field, sources] of [['patterns', rule.patterns], ['exclusions', rule.exclusions]] as const) {
        sources.forEach((source, j) => {
          const problem = invalidPattern(source)
          if (problem) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid pattern: ${problem}`, path: ['categoryRules', i, field, j] })
          }
        })
      }
    })

    const signalIds = new Set<string>()
    data.severitySignals.forEach((signal, i) => {
      if (signalIds.has(signal.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate signal id "${signal.id}"`, path: ['severitySignals', i, 'id'] })
      }
      signalIds.add(signal.id)
      const problem = invalidPattern(signal.pattern)
      if (problem) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid pattern: ${problem}`, path: ['severitySignals', i, 'pattern'] })
      }
    })

    if (data.riskTiers.lowMax >= data.riskTiers.mediumMax) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `riskTiers.lowMax (${data.riskTiers.lowMax}) must be below riskTiers.mediumMax (${data.riskTiers.mediumMax})`,
        path: ['riskTiers'],
      })
    }
  })

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>
