/**
 * Pipeline orchestration, input validation, and JSON export.
 */

export { ObligationPipeline, resolveFiscalYearEnd } from './pipeline.js'
export { validateDocumentText, MAX_CONTROL_RATIO } from './input.js'
export { exportToJSON, parseObligationExport } from './serialization.js'

export {
  RunOptionsSchema,
  DiagnosticSchema,
  RunStatsSchema,
  PipelineResultSchema,
  ObligationExportSchema,
  EXPORT_VERSION,
} from './schemas.js'
export type { RunOptions, Diagnostic, RunStats, PipelineResult, ObligationExport } from './schemas.js'
