/**
 * Obligation extraction: clause segmentation, rule classification, spillover checks.
 */

export { segmentClauses, countTokens } from './segmenter.js'
export type { RawClause, SegmenterOptions, Segmentation } from './segmenter.js'

export { compileRules, matchRule } from './rules.js'
export type { CompiledRule, RuleHit } from './rules.js'

export { classifyClause, mergeEvidence } from './classifier.js'
export type { Classification, TaggedHit } from './classifier.js'

export {
  extractObligations,
  normalizeDescription,
  dedupeKey,
  obligationId,
  findResponsibleParty,
} from './extractor.js'
export type { ExtractionOptions, Extraction } from './extractor.js'

export { detectSpillover } from './spillover.js'
