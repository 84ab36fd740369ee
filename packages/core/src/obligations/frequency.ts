import { PERIOD_MONTHS } from '../deadlines/index.js'
import type { DeadlineParse, RecurrencePeriod } from '../deadlines/index.js'
import type { Frequency } from './schemas.js'

/**
 * How often an obligation falls due. The shortest period wins, whether it
 * comes from a recurrence or from an "each fiscal year end" anchor; a clause
 * with only fixed dates is one-time; an event-anchored duty is event-based.
 */
export function deriveFrequency(
  parse: Pick<DeadlineParse, 'descriptors' | 'eventTriggered' | 'impliedPeriods'>,
): Frequency {
  const periods: RecurrencePeriod[] = [...parse.impliedPeriods]
  for (const d of parse.descriptors) {
    if (d.kind === 'recurrence') periods.push(d.period)
  }
  let shortest: Frequency | null = null
  let shortestMonths = Infinity
  for (const period of periods) {
    if (PERIOD_MONTHS[period] < shortestMonths) {
      shortest = period
      shortestMonths = PERIOD_MONTHS[period]
    }
  }
  if (shortest) return shortest
  if (parse.descriptors.length > 0) return 'one-time'
  if (parse.eventTriggered) return 'event-based'
  return 'unspecified'
}
