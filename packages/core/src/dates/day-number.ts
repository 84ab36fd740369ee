/**
 * Calendar arithmetic over integer day numbers (days since 1970-01-01, UTC).
 * Period and offset arithmetic happens on integers; dates cross module
 * boundaries as YYYY-MM-DD strings only.
 */

export type DayNumber = number

export interface DateParts {
  year: number
  month: number
  day: number
}

const MS_PER_DAY = 86_400_000
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate()
}

/** Day number for a calendar date, or null when the date does not exist. */
export function fromParts(year: number, month: number, day: number): DayNumber | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return null
  if (year < 1000 || year > 9999) return null
  if (month < 1 || month > 12) return null
  if (day < 1 || day > daysInMonth(year, month)) return null
  return Date.UTC(year, month - 1, day) / MS_PER_DAY
}

export function toParts(dayNumber: DayNumber): DateParts {
  const date = new Date(dayNumber * MS_PER_DAY)
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  }
}

export function parseISODate(value: string): DayNumber | null {
  const match = ISO_DATE_RE.exec(value)
  if (!match) return null
  return fromParts(parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10))
}

export function toISODate(dayNumber: DayNumber): string {
  const { year, month, day } = toParts(dayNumber)
  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`
}

/** UTC YYYY-MM-DD. Single source of truth for "today". */
export function todayISO(): string {
  return new Date().toISOString().slice(0, 10)
}

/** 0 = Sunday … 6 = Saturday. Day 0 (1970-01-01) was a Thursday. */
export function dayOfWeek(dayNumber: DayNumber): number {
  return (((dayNumber % 7) + 7) % 7 + 4) % 7
}

export function isWeekend(dayNumber: DayNumber): boolean {
  const dow = dayOfWeek(dayNumber)
  return dow === 0 || dow === 6
}

/** Advance by `count` weekdays. Saturdays and Sundays are skipped; holidays are not modelled. */
export function addBusinessDays(dayNumber: DayNumber, count: number): DayNumber {
  let cursor = dayNumber
  let remaining = count
  while (remaining > 0) {
    cursor++
    if (!isWeekend(cursor)) remaining--
  }
  return cursor
}

export function isLastDayOfMonth(dayNumber: DayNumber): boolean {
  const { year, month, day } = toParts(dayNumber)
  return day === daysInMonth(year, month)
}

/**
 * Shift by whole calendar months. Days past the end of the target month clamp
 * to its last day; a start date on a month end stays on month ends.
 */
export function addMonths(
  dayNumber: DayNumber,
  months: number,
  keepMonthEnd: boolean = isLastDayOfMonth(dayNumber),
): DayNumber {
  const { year, month, day } = toParts(dayNumber)
  const total = year * 12 + (month - 1) + months
  const targetYear = Math.floor(total / 12)
  const targetMonth = total - targetYear * 12 + 1
  const lastDay = daysInMonth(targetYear, targetMonth)
  const targetDay = keepMonthEnd ? lastDay : Math.min(day, lastDay)
  return Date.UTC(targetYear, targetMonth - 1, targetDay) / MS_PER_DAY
}

/** Months between the calendar months of two days, ignoring the day of month. */
export function monthsBetween(from: DayNumber, to: DayNumber): number {
  const a = toParts(from)
  const b = toParts(to)
  return (b.year - a.year) * 12 + (b.month - a.month)
}
