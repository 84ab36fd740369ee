/**
 * Read-side views over tracked obligations: the high-risk list and the
 * upcoming-deadline list a dashboard shows. Pure filters; input order is kept
 * unless noted.
 */

import type { Obligation } from '../obligations/index.js'

export function selectHighRisk(obligations: Obligation[]): Obligation[] {
  return obligations.filter((o) => o.risk.tier === 'high')
}

/**
 * Obligations with a deadline on or after the reference date, soonest first.
 * Ties fall back to document order.
 */
export function selectUpcoming(obligations: Obligation[], withinDays?: number): Obligation[] {
  return obligations
    .map((o, index) => ({ o, index }))
    .filter(({ o }) => {
      const days = o.compliance.daysUntilDue
      if (days === null || days < 0) return false
      return withinDays === undefined || days <= withinDays
    })
    .sort((a, b) => (a.o.compliance.daysUntilDue ?? 0) - (b.o.compliance.daysUntilDue ?? 0) || a.index - b.index)
    .map(({ o }) => o)
}
