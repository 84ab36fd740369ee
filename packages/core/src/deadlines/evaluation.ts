/**
 * Pure functions for deadline occurrence arithmetic.
 */

import { TrackerError } from '../common/index.js'
import { addBusinessDays, addMonths, monthsBetween, parseISODate } from '../dates/index.js'
import type { DayNumber } from '../dates/index.js'
import { PERIOD_MONTHS } from './schemas.js'
import type { DeadlineDescriptor, DeadlineOffset, RecurringDeadline } from './schemas.js'

function requireDay(value: string, field: string): DayNumber {
  const day = parseISODate(value)
  if (day === null) {
    throw new TrackerError('INPUT_ERROR', `${field} is not a valid date: ${value}`, { stage: 'compliance' })
  }
  return day
}

export function applyOffset(dayNumber: DayNumber, offset: DeadlineOffset | null): DayNumber {
  if (!offset) return dayNumber
  switch (offset.unit) {
    case 'days':
      return dayNumber + offset.amount
    case 'business-days':
      return addBusinessDays(dayNumber, offset.amount)
    case 'weeks':
      return dayNumber + offset.amount * 7
    case 'months':
      return addMonths(dayNumber, offset.amount)
  }
}

/** The `index`-th period boundary after the anchor, plus the descriptor's offset. */
export function occurrenceAt(descriptor: RecurringDeadline, index: number): DayNumber {
  const anchor = requireDay(descriptor.anchorDate, 'anchorDate')
  const boundary = addMonths(anchor, index * PERIOD_MONTHS[descriptor.period])
  return applyOffset(boundary, descriptor.offset)
}

/**
 * First occurrence on or after the reference day.
 * Fiscal-year-end anchors mark calendar period ends, so every boundary counts,
 * including ones before the anchor. Agreement-date anchors start one period in.
 */
export function nextOccurrence(descriptor: RecurringDeadline, referenceDay: DayNumber): DayNumber {
  const anchor = requireDay(descriptor.anchorDate, 'anchorDate')
  const months = PERIOD_MONTHS[descriptor.period]
  const minIndex = descriptor.anchor === 'agreement-date' ? 1 : -Infinity

  let index = Math.max(minIndex, Math.floor(monthsBetween(anchor, referenceDay) / months))
  while (index - 1 >= minIndex && occurrenceAt(descriptor, index - 1) >= referenceDay) index--
  while (occurrenceAt(descriptor, index) < referenceDay) index++

  return occurrenceAt(descriptor, index)
}

/** The date a descriptor is measured against: its fixed date, or the next recurrence. */
export function occurrenceFor(descriptor: DeadlineDescriptor, referenceDay: DayNumber): DayNumber {
  if (descriptor.kind === 'absolute') return requireDay(descriptor.date, 'date')
  return nextOccurrence(descriptor, referenceDay)
}
