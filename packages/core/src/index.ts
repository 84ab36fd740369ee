/**
 * @covenant-tracker/core
 *
 * Extracts borrower obligations from loan-agreement text, attaches deadlines,
 * scores risk, and derives compliance status against a reference date.
 */

export * from './common/index.js'
export * from './dates/index.js'
export * from './deadlines/index.js'
export * from './obligations/index.js'
export * from './config/index.js'
export * from './extraction/index.js'
export * from './risk/index.js'
export * from './compliance/index.js'
export * from './pipeline/index.js'
