/**
 * Portfolio roll-up over tracked obligations.
 */

import type { Obligation, PortfolioSummary } from '../obligations/index.js'

function round2(value: number): number {
  return Math.round(value * 100) / 100
}

export function summarize(obligations: Obligation[]): PortfolioSummary {
  const summary: PortfolioSummary = {
    totalObligations: obligations.length,
    byCategory: { 'financial-covenant': 0, 'reporting-requirement': 0, notification: 0, other: 0 },
    byStatus: { compliant: 0, 'due-soon': 0, missed: 0, 'not-applicable': 0 },
    byRiskTier: { low: 0, medium: 0, high: 0 },
    overallRiskIndex: 0,
    missedCount: 0,
    dueSoonCount: 0,
    highRiskCount: 0,
  }
  if (obligations.length === 0) return summary

  let scoreTotal = 0
  for (const o of obligations) {
    summary.byCategory[o.category]++
    summary.byStatus[o.compliance.status]++
    summary.byRiskTier[o.risk.tier]++
    scoreTotal += o.risk.score
  }

  summary.overallRiskIndex = round2(scoreTotal / obligations.length)
  summary.missedCount = summary.byStatus.missed
  summary.dueSoonCount = summary.byStatus['due-soon']
  summary.highRiskCount = summary.byRiskTier.high
  return summary
}
