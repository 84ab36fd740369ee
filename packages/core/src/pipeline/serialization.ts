/**
 * JSON export/import of pipeline results. The export is versioned and is
 * validated on the way back in with the same schemas the pipeline uses.
 */

import { Err, Ok, TrackerError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { EXPORT_VERSION, ObligationExportSchema } from './schemas.js'
import type { ObligationExport, PipelineResult } from './schemas.js'

export function exportToJSON(result: PipelineResult): string {
  const document: ObligationExport = { version: EXPORT_VERSION, ...result }
  return JSON.stringify(document, null, 2)
}

export function parseObligationExport(json: string): Result<ObligationExport> {
  let raw: unknown
  try {
    raw = JSON.parse(json)
  } catch (e) {
    return Err(TrackerError.parse(`Export is not valid JSON: ${(e as Error).message}`))
  }

  const parsed = ObligationExportSchema.safeParse(raw)
  if (!parsed.success) {
    const first = parsed.error.issues[0]
    const where = first.path.length > 0 ? `${first.path.join('.')}: ` : ''
    return Err(TrackerError.parse(`Invalid obligation export: ${where}${first.message}`))
  }
  return Ok(parsed.data)
}
