export {
  daysInMonth,
  fromParts,
  toParts,
  parseISODate,
  toISODate,
  todayISO,
  dayOfWeek,
  isWeekend,
  addBusinessDays,
  isLastDayOfMonth,
  addMonths,
  monthsBetween,
} from './day-number.js'

export type { DayNumber, DateParts } from './day-number.js'
