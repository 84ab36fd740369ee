/**
 * Risk scoring. Deterministic and total.
 *
 * score = clamp(baseScores[category] + min(sum of matched signal weights, cap), 0, 100)
 * Each signal counts once however often its cue repeats.
 */

import type { BaseScores, PipelineConfig, RiskTierThresholds } from '../config/index.js'
import type { DatedObligation, RiskAssessment, RiskTier, ScoredObligation } from '../obligations/index.js'

export interface CompiledSignal {
  id: string
  re: RegExp
  weight: number
}

export interface RiskModel {
  baseScores: BaseScores
  signals: CompiledSignal[]
  bonusCap: number
  tiers: RiskTierThresholds
}

export function compileRiskModel(
  config: Pick<PipelineConfig, 'baseScores' | 'severitySignals' | 'severityBonusCap' | 'riskTiers'>,
): RiskModel {
  return {
    baseScores: config.baseScores,
    signals: config.severitySignals.map((s) => ({ id: s.id, re: new RegExp(s.pattern, 'i'), weight: s.weight })),
    bonusCap: config.severityBonusCap,
    tiers: config.riskTiers,
  }
}

export function clampScore(score: number): number {
  if (Number.isNaN(score)) return 0
  return Math.min(100, Math.max(0, score))
}

/** Upper bound of each band is closed: a score equal to lowMax is low. */
export function tierForScore(score: number, tiers: RiskTierThresholds): RiskTier {
  if (score <= tiers.lowMax) return 'low'
  if (score <= tiers.mediumMax) return 'medium'
  return 'high'
}

export function assessRisk(category: DatedObligation['category'], description: string, model: RiskModel): RiskAssessment {
  const matched = model.signals.filter((s) => s.re.test(description))
  const rawBonus = matched.reduce((sum, s) => sum + s.weight, 0)
  const bonus = Math.min(rawBonus, model.bonusCap)
  const score = clampScore(model.baseScores[category] + bonus)

  return {
    score,
    tier: tierForScore(score, model.tiers),
    signals: matched.map((s) => s.id),
    bonus,
  }
}

export function scoreObligation(obligation: DatedObligation, model: RiskModel): ScoredObligation {
  return { ...obligation, risk: assessRisk(obligation.category, obligation.description, model) }
}
