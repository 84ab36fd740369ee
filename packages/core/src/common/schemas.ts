/**
 * Shared Zod schemas used across modules.
 */

import { z } from 'zod'
import { parseISODate } from '../dates/index.js'

export const UUIDSchema = z.string().uuid()

/** YYYY-MM-DD naming a real calendar day. */
export const ISODateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD')
  .refine((value) => parseISODate(value) !== null, { message: 'Date is not a valid calendar day' })

/** MM-DD, used for recurring calendar points such as a fiscal year end. */
export const MonthDaySchema = z
  .string()
  .regex(/^\d{2}-\d{2}$/, 'Month/day must be MM-DD')
  .refine((value) => parseISODate(`2000-${value}`) !== null, { message: 'Month/day is not a valid calendar day' })

export const SpanSchema = z.object({
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
})

export type Span = z.infer<typeof SpanSchema>
