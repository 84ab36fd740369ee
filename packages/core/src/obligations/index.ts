/**
 * Obligation entities: staged record schemas and portfolio summary.
 */

export {
  ObligationCategorySchema,
  CATEGORY_PRIORITY,
  RiskTierSchema,
  ComplianceStatusSchema,
  FrequencySchema,
  EvidenceSpanSchema,
  ReviewFlagSchema,
  RiskAssessmentSchema,
  ComplianceAssessmentSchema,
  ExtractedObligationSchema,
  DatedObligationSchema,
  ScoredObligationSchema,
  TrackedObligationSchema,
  PortfolioSummarySchema,
} from './schemas.js'

export type {
  ObligationCategory,
  RiskTier,
  ComplianceStatus,
  Frequency,
  EvidenceSpan,
  ReviewFlag,
  RiskAssessment,
  ComplianceAssessment,
  ExtractedObligation,
  DatedObligation,
  ScoredObligation,
  TrackedObligation,
  Obligation,
  PortfolioSummary,
} from './schemas.js'

export { deriveFrequency } from './frequency.js'
