/**
 * Compiled category rules. Patterns are compiled once per pipeline instance.
 */

import type { CategoryRule } from '../config/index.js'
import type { ObligationCategory } from '../obligations/index.js'

export interface CompiledRule {
  id: string
  category: ObligationCategory
  patterns: RegExp[]
  exclusions: RegExp[]
}

/** Clause-relative match offsets. */
export interface RuleHit {
  start: number
  end: number
}

export function compileRules(rules: CategoryRule[]): CompiledRule[] {
  return rules.map((rule) => ({
    id: rule.id,
    category: rule.category,
    patterns: rule.patterns.map((source) => new RegExp(source, 'gi')),
    exclusions: rule.exclusions.map((source) => new RegExp(source, 'i')),
  }))
}

/**
 * Every span matched by the rule's patterns, or null when nothing matched or
 * an exclusion vetoes the clause.
 */
export function matchRule(rule: CompiledRule, text: string): RuleHit[] | null {
  if (rule.exclusions.some((re) => re.test(text))) return null

  const hits: RuleHit[] = []
  for (const re of rule.patterns) {
    for (const m of text.matchAll(re)) {
      if (m[0].length === 0) continue
      const start = m.index ?? 0
      hits.push({ start, end: start + m[0].length })
    }
  }
  return hits.length > 0 ? hits : null
}
