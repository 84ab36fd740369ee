/**
 * Pipeline configuration: schemas, validation, and the bundled default rule set.
 */

export {
  CategoryRuleSchema,
  SeveritySignalSchema,
  BaseScoresSchema,
  RiskTierThresholdsSchema,
  PipelineConfigSchema,
} from './schemas.js'

export type {
  CategoryRule,
  SeveritySignal,
  BaseScores,
  RiskTierThresholds,
  PipelineConfig,
  PipelineConfigInput,
} from './schemas.js'

export { parsePipelineConfig, loadPipelineConfig, defaultPipelineConfig } from './loader.js'
