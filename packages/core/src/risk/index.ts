export { compileRiskModel, clampScore, tierForScore, assessRisk, scoreObligation } from './scoring.js'
export type { CompiledSignal, RiskModel } from './scoring.js'
