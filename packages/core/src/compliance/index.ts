/**
 * Compliance tracking: status derivation, portfolio summary, dashboard views.
 */

export { STATUS_SEVERITY, statusForDate, assessCompliance, evaluate, trackObligation } from './tracker.js'
export { summarize } from './summary.js'
export { selectHighRisk, selectUpcoming } from './queries.js'
