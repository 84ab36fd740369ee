/**
 * Configuration loading. Validates rule tables before any document is processed.
 */

import { readFileSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import type { ZodError } from 'zod'
import { Err, Ok, TrackerError, unwrap } from '../common/index.js'
import type { Result } from '../common/index.js'
import { PipelineConfigSchema } from './schemas.js'
import type { PipelineConfig } from './schemas.js'

const DEFAULT_RULES_URL = new URL('./default-rules.json', import.meta.url)

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

/** Validate an already-parsed configuration object. */
export function parsePipelineConfig(input: unknown): Result<PipelineConfig> {
  const parsed = PipelineConfigSchema.safeParse(input)
  if (!parsed.success) {
    return Err(TrackerError.configuration(`Invalid pipeline configuration: ${describeIssues(parsed.error)}`))
  }
  return Ok(parsed.data)
}

function parseConfigJson(raw: string, source: string): Result<PipelineConfig> {
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (e) {
    return Err(TrackerError.configuration(`Configuration at ${source} is not valid JSON: ${(e as Error).message}`))
  }
  return parsePipelineConfig(json)
}

/** Read and validate a JSON rule file. */
export async function loadPipelineConfig(filePath: string): Promise<Result<PipelineConfig>> {
  let raw: string
  try {
    raw = await readFile(filePath, 'utf-8')
  } catch (e) {
    return Err(TrackerError.io(`Failed to read configuration ${filePath}: ${(e as Error).message}`))
  }
  return parseConfigJson(raw, filePath)
}

/** The bundled rule set. Throws if the bundled file itself is broken. */
export function defaultPipelineConfig(): PipelineConfig {
  const raw = readFileSync(DEFAULT_RULES_URL, 'utf-8')
  return unwrap(parseConfigJson(raw, 'default-rules.json'))
}
