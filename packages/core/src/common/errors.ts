/**
 * Typed error class for covenant tracker operations.
 */

export type ErrorCode =
  | 'INPUT_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'DATE_ARITHMETIC_ERROR'
  | 'IO_ERROR'
  | 'PARSE_ERROR'

export type PipelineStage =
  | 'config'
  | 'input'
  | 'segment'
  | 'classify'
  | 'deadline'
  | 'risk'
  | 'compliance'
  | 'export'

/** Where a failure happened. */
export interface ErrorContext {
  stage: PipelineStage
  span?: { start: number; end: number }
  excerpt?: string
}

export class TrackerError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext | undefined

  constructor(code: ErrorCode, message: string, context?: ErrorContext) {
    super(message)
    this.name = 'TrackerError'
    this.code = code
    this.context = context
  }

  static input(message: string): TrackerError {
    return new TrackerError('INPUT_ERROR', message, { stage: 'input' })
  }

  static configuration(message: string): TrackerError {
    return new TrackerError('CONFIGURATION_ERROR', message, { stage: 'config' })
  }

  static io(message: string): TrackerError {
    return new TrackerError('IO_ERROR', message)
  }

  static parse(message: string, stage: PipelineStage = 'export'): TrackerError {
    return new TrackerError('PARSE_ERROR', message, { stage })
  }
}
