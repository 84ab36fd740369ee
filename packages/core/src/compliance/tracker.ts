/**
 * Compliance status derivation. Re-derived on every call from the deadline
 * descriptors and the caller's reference date; nothing is stored.
 */

import { TrackerError } from '../common/index.js'
import { parseISODate, toISODate } from '../dates/index.js'
import type { DayNumber } from '../dates/index.js'
import { occurrenceFor } from '../deadlines/index.js'
import type { DeadlineDescriptor } from '../deadlines/index.js'
import type {
  ComplianceAssessment,
  ComplianceStatus,
  ScoredObligation,
  TrackedObligation,
} from '../obligations/index.js'

/** Higher is worse. */
export const STATUS_SEVERITY: Record<ComplianceStatus, number> = {
  'not-applicable': 0,
  compliant: 1,
  'due-soon': 2,
  missed: 3,
}

/** The window counts calendar days; weekends and holidays are not skipped. */
export function statusForDate(dueDay: DayNumber, referenceDay: DayNumber, dueSoonWindowDays: number): ComplianceStatus {
  if (dueDay < referenceDay) return 'missed'
  if (dueDay <= referenceDay + dueSoonWindowDays) return 'due-soon'
  return 'compliant'
}

function requireReferenceDay(referenceDate: string): DayNumber {
  const day = parseISODate(referenceDate)
  if (day === null) {
    throw new TrackerError('INPUT_ERROR', `referenceDate is not a valid date: ${referenceDate}`, { stage: 'compliance' })
  }
  return day
}

/**
 * Worst status across all descriptors, with the occurrence that decided it.
 * Ties on status keep the earliest due date.
 *
 * @throws TrackerError (`INPUT_ERROR`) when `referenceDate` or a descriptor's
 * date is not a real ISO date. `ObligationPipeline.run` validates both first,
 * so only direct callers with unchecked dates reach this.
 */
export function assessCompliance(
  descriptors: DeadlineDescriptor[],
  referenceDate: string,
  dueSoonWindowDays: number,
): ComplianceAssessment {
  const referenceDay = requireReferenceDay(referenceDate)
  let worst: { status: ComplianceStatus; dueDay: DayNumber } | null = null

  for (const descriptor of descriptors) {
    const dueDay = occurrenceFor(descriptor, referenceDay)
    const status = statusForDate(dueDay, referenceDay, dueSoonWindowDays)
    if (
      !worst ||
      STATUS_SEVERITY[status] > STATUS_SEVERITY[worst.status] ||
      (status === worst.status && dueDay < worst.dueDay)
    ) {
      worst = { status, dueDay }
    }
  }

  if (!worst) return { status: 'not-applicable', dueDate: null, daysUntilDue: null }
  return {
    status: worst.status,
    dueDate: toISODate(worst.dueDay),
    daysUntilDue: worst.dueDay - referenceDay,
  }
}

/**
 * Status only. Throws on an invalid date like {@link assessCompliance}
 * instead of returning a Result.
 */
export function evaluate(
  obligation: Pick<ScoredObligation, 'deadlines'>,
  referenceDate: string,
  dueSoonWindowDays: number,
): ComplianceStatus {
  return assessCompliance(obligation.deadlines, referenceDate, dueSoonWindowDays).status
}

export function trackObligation(
  obligation: ScoredObligation,
  referenceDate: string,
  dueSoonWindowDays: number,
): TrackedObligation {
  return { ...obligation, compliance: assessCompliance(obligation.deadlines, referenceDate, dueSoonWindowDays) }
}
