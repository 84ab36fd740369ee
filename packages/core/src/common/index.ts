/**
 * Common utilities: Result pattern and typed errors.
 */

export { Ok, Err, unwrap, mapResult } from './result.js'
export type { Result } from './result.js'

export { TrackerError } from './errors.js'
export type { ErrorCode, ErrorContext, PipelineStage } from './errors.js'

export { UUIDSchema, ISODateSchema, MonthDaySchema, SpanSchema } from './schemas.js'
export type { Span } from './schemas.js'
