/**
 * Obligation extraction: segmentation, classification, and identity.
 *
 * Ids are UUID v5 over the clause span and description, so the same document
 * always yields the same ids.
 */

import { v5 as uuidv5 } from 'uuid'
import type { ExtractedObligation } from '../obligations/index.js'
import { classifyClause } from './classifier.js'
import type { CompiledRule } from './rules.js'
import { segmentClauses } from './segmenter.js'
import type { RawClause } from './segmenter.js'

const OBLIGATION_NAMESPACE = '6f1c1d52-3b7e-4a8e-9c41-2d0b7f4e9a13'

const DEFAULT_PARTY = 'Borrower'

const PARTY_RE = /\b(borrowers?|guarantors?|obligors?|loan part(?:y|ies)|sponsors?)\b/i

const PARTY_NAMES: Array<[prefix: string, name: string]> = [
  ['borrower', 'Borrower'],
  ['guarantor', 'Guarantor'],
  ['obligor', 'Obligor'],
  ['loan part', 'Loan Parties'],
  ['sponsor', 'Sponsor'],
]

export interface ExtractionOptions {
  minClauseTokens?: number
  dedupeClauses?: boolean
}

export interface Extraction {
  obligations: ExtractedObligation[]
  fragments: RawClause[]
  /** Clauses no rule matched. */
  unmatched: RawClause[]
  /** Clauses dropped as repeats of an earlier clause. */
  duplicates: RawClause[]
}

export function normalizeDescription(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

/** Case- and punctuation-insensitive key for duplicate detection. */
export function dedupeKey(description: string): string {
  return description.toLowerCase().replace(/[^a-z0-9]+/g, ' ').trim()
}

export function obligationId(start: number, end: number, description: string): string {
  return uuidv5(`${start}:${end}:${description}`, OBLIGATION_NAMESPACE)
}

export function findResponsibleParty(text: string): string {
  const m = PARTY_RE.exec(text)
  if (!m) return DEFAULT_PARTY
  const word = m[1].toLowerCase()
  return PARTY_NAMES.find(([prefix]) => word.startsWith(prefix))?.[1] ?? DEFAULT_PARTY
}

/** Extract obligations from a document in order of appearance. */
export function extractObligations(
  text: string,
  rules: CompiledRule[],
  options: ExtractionOptions = {},
): Extraction {
  const dedupe = options.dedupeClauses ?? true
  const { clauses, fragments } = segmentClauses(text, { minClauseTokens: options.minClauseTokens })

  const obligations: ExtractedObligation[] = []
  const unmatched: RawClause[] = []
  const duplicates: RawClause[] = []
  const seen = new Set<string>()

  for (const clause of clauses) {
    const classification = classifyClause(clause.text, rules, clause.start)
    if (!classification) {
      unmatched.push(clause)
      continue
    }

    const description = normalizeDescription(clause.text)
    if (dedupe) {
      const key = dedupeKey(description)
      if (seen.has(key)) {
        duplicates.push(clause)
        continue
      }
      seen.add(key)
    }

    obligations.push({
      id: obligationId(clause.start, clause.end, description),
      category: classification.category,
      description,
      span: { start: clause.start, end: clause.end },
      marker: clause.marker,
      responsibleParty: findResponsibleParty(clause.text),
      matchedRuleIds: classification.matchedRuleIds,
      evidence: classification.evidence,
    })
  }

  return { obligations, fragments, unmatched, duplicates }
}
