/**
 * Obligation pipeline: extraction → deadlines → risk → compliance.
 *
 * A pipeline instance holds only its validated configuration and the rules
 * compiled from it. Every run is independent and returns fresh records.
 */

import type { ZodError } from 'zod'
import { Err, Ok, TrackerError, mapResult } from '../common/index.js'
import type { Result } from '../common/index.js'
import { parsePipelineConfig } from '../config/index.js'
import type { PipelineConfig } from '../config/index.js'
import { daysInMonth, fromParts, parseISODate, toISODate, todayISO, toParts } from '../dates/index.js'
import type { DayNumber } from '../dates/index.js'
import { parseDeadlines } from '../deadlines/index.js'
import type { DeadlineAnchors } from '../deadlines/index.js'
import { compileRules, detectSpillover, extractObligations } from '../extraction/index.js'
import type { CompiledRule } from '../extraction/index.js'
import { deriveFrequency } from '../obligations/index.js'
import type { DatedObligation, ExtractedObligation } from '../obligations/index.js'
import { compileRiskModel, scoreObligation } from '../risk/index.js'
import type { RiskModel } from '../risk/index.js'
import { summarize, trackObligation } from '../compliance/index.js'
import { RunOptionsSchema } from './schemas.js'
import type { Diagnostic, PipelineResult, RunOptions } from './schemas.js'
import { validateDocumentText } from './input.js'

const LOG_TAG = '[obligation-pipeline]'
const MAX_EXCERPT_CHARS = 80

function excerpt(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim()
  return flat.length > MAX_EXCERPT_CHARS ? `${flat.slice(0, MAX_EXCERPT_CHARS - 1)}…` : flat
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

/**
 * The configured fiscal year end (MM-DD) that most recently fell on or before
 * the reference day. Feb 29 falls back to Feb 28 in common years.
 */
export function resolveFiscalYearEnd(monthDay: string, referenceDay: DayNumber): DayNumber {
  const [month, day] = monthDay.split('-').map((part) => parseInt(part, 10))
  const at = (year: number): DayNumber =>
    fromParts(year, month, Math.min(day, daysInMonth(year, month))) ?? referenceDay
  const { year } = toParts(referenceDay)
  const candidate = at(year)
  return candidate <= referenceDay ? candidate : at(year - 1)
}

interface DatingOutcome {
  obligation: DatedObligation
  diagnostics: Diagnostic[]
  skipped: number
}

export class ObligationPipeline {
  private readonly rules: CompiledRule[]
  private readonly riskModel: RiskModel

  private constructor(readonly config: PipelineConfig) {
    this.rules = compileRules(config.categoryRules)
    this.riskModel = compileRiskModel(config)
  }

  /** Validate configuration up front; a broken rule set never reaches a document. */
  static create(input: unknown): Result<ObligationPipeline> {
    const created = mapResult(parsePipelineConfig(input), (config) => new ObligationPipeline(config))
    if (!created.ok) console.warn(`${LOG_TAG} config rejected | error=${created.error.message}`)
    return created
  }

  run(text: unknown, options: RunOptions = {}): Result<PipelineResult> {
    const parsedOptions = RunOptionsSchema.safeParse(options)
    if (!parsedOptions.success) {
      return Err(TrackerError.input(`Invalid run options: ${describeIssues(parsedOptions.error)}`))
    }
    const document = validateDocumentText(text)
    if (!document.ok) {
      console.warn(`${LOG_TAG} input rejected | error=${document.error.message}`)
      return document
    }
    const source = document.value

    const opts = parsedOptions.data
    const referenceDate = opts.referenceDate ?? todayISO()
    const referenceDay = parseISODate(referenceDate)
    if (referenceDay === null) {
      return Err(TrackerError.input(`referenceDate is not a valid date: ${referenceDate}`))
    }
    const dueSoonWindowDays = opts.dueSoonWindowDays ?? this.config.dueSoonWindowDays
    const anchors: DeadlineAnchors = {
      agreementDate: opts.agreementDate ?? null,
      fiscalYearEnd: opts.fiscalYearEnd ?? toISODate(resolveFiscalYearEnd(this.config.fiscalYearEnd, referenceDay)),
    }

    const extraction = extractObligations(source, this.rules, {
      minClauseTokens: this.config.minClauseTokens,
      dedupeClauses: this.config.dedupeClauses,
    })

    const diagnostics: Diagnostic[] = []
    let skippedDeadlines = 0
    const obligations = extraction.obligations.map((extracted) => {
      const dated = this.dateObligation(extracted, source, anchors)
      diagnostics.push(...dated.diagnostics)
      skippedDeadlines += dated.skipped
      const scored = scoreObligation(dated.obligation, this.riskModel)
      return trackObligation(scored, referenceDate, dueSoonWindowDays)
    })

    const clauses = extraction.obligations.length + extraction.unmatched.length + extraction.duplicates.length
    console.info(
      `${LOG_TAG} run complete | ref=${referenceDate} | clauses=${clauses} | obligations=${obligations.length} | diagnostics=${diagnostics.length}`,
    )

    return Ok({
      referenceDate,
      fiscalYearEnd: anchors.fiscalYearEnd,
      agreementDate: anchors.agreementDate,
      dueSoonWindowDays,
      obligations,
      summary: summarize(obligations),
      diagnostics,
      stats: {
        clauses,
        fragments: extraction.fragments.length,
        unmatched: extraction.unmatched.length,
        duplicates: extraction.duplicates.length,
        obligations: obligations.length,
        skippedDeadlines,
      },
    })
  }

  private dateObligation(obligation: ExtractedObligation, document: string, anchors: DeadlineAnchors): DatingOutcome {
    const { start, end } = obligation.span
    const clauseText = document.slice(start, end)
    const parse = parseDeadlines(clauseText, anchors, { defaultDayCount: this.config.defaultDayCount })
    const reviewFlags = detectSpillover(clauseText, parse.descriptors)
    const diagnostics: Diagnostic[] = []

    for (const skip of parse.skipped) {
      console.warn(
        `${LOG_TAG} skip: date-arithmetic | span=${start}-${end} | phrase="${excerpt(skip.sourceText)}" | reason=${skip.reason}`,
      )
      diagnostics.push({
        code: 'DATE_ARITHMETIC_ERROR',
        stage: 'deadline',
        obligationId: obligation.id,
        span: { start, end },
        excerpt: excerpt(skip.sourceText),
        message: skip.reason,
      })
    }
    for (const flag of reviewFlags) {
      console.warn(`${LOG_TAG} review: possible-false-attachment | span=${start}-${end} | ${flag.detail}`)
      diagnostics.push({
        code: 'POSSIBLE_FALSE_ATTACHMENT',
        stage: 'deadline',
        obligationId: obligation.id,
        span: { start, end },
        excerpt: excerpt(clauseText),
        message: flag.detail,
      })
    }

    return {
      obligation: {
        ...obligation,
        deadlines: parse.descriptors,
        frequency: deriveFrequency(parse),
        reviewFlags,
      },
      diagnostics,
      skipped: parse.skipped.length,
    }
  }
}
