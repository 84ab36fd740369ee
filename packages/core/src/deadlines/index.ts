/**
 * Deadline parsing: descriptor schemas, phrase parser, and occurrence arithmetic.
 */

export {
  RecurrencePeriodSchema,
  OffsetUnitSchema,
  DeadlineAnchorSchema,
  DayCountModeSchema,
  DeadlineOffsetSchema,
  AbsoluteDeadlineSchema,
  RecurringDeadlineSchema,
  DeadlineDescriptorSchema,
  PERIOD_MONTHS,
} from './schemas.js'

export type {
  RecurrencePeriod,
  OffsetUnit,
  DeadlineAnchor,
  DayCountMode,
  DeadlineOffset,
  AbsoluteDeadline,
  RecurringDeadline,
  DeadlineDescriptor,
  DeadlineAnchors,
  DeadlineParseOptions,
  SkippedDeadline,
  DeadlineParse,
} from './schemas.js'

export { parseDeadlines } from './parser.js'
export { parseQuantity } from './numbers.js'

export {
  applyOffset,
  occurrenceAt,
  nextOccurrence,
  occurrenceFor,
} from './evaluation.js'
