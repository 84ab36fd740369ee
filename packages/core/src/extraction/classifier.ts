/**
 * Priority classification of clauses into obligation categories.
 *
 * Categories are tried in CATEGORY_PRIORITY order and the first one with a
 * matching rule wins. Within the winning category every matching rule
 * contributes evidence, so one clause never yields two obligations.
 */

import { CATEGORY_PRIORITY } from '../obligations/index.js'
import type { EvidenceSpan, ObligationCategory } from '../obligations/index.js'
import { matchRule } from './rules.js'
import type { CompiledRule } from './rules.js'

export interface Classification {
  category: ObligationCategory
  /** In rule-table order. */
  matchedRuleIds: string[]
  evidence: EvidenceSpan[]
}

export interface TaggedHit {
  start: number
  end: number
  ruleId: string
}

/** Union of hit spans: overlapping spans merge and pool their rule ids. */
export function mergeEvidence(hits: TaggedHit[], text: string, offset = 0): EvidenceSpan[] {
  const sorted = [...hits].sort((a, b) => a.start - b.start || b.end - a.end)
  const merged: Array<{ start: number; end: number; ruleIds: string[] }> = []

  for (const hit of sorted) {
    const last = merged[merged.length - 1]
    if (last && hit.start < last.end) {
      last.end = Math.max(last.end, hit.end)
      if (!last.ruleIds.includes(hit.ruleId)) last.ruleIds.push(hit.ruleId)
    } else {
      merged.push({ start: hit.start, end: hit.end, ruleIds: [hit.ruleId] })
    }
  }

  return merged.map((span) => ({
    start: span.start + offset,
    end: span.end + offset,
    text: text.slice(span.start, span.end),
    ruleIds: span.ruleIds,
  }))
}

/**
 * Classify one clause. `offset` shifts evidence spans into document
 * coordinates. Returns null when no rule of any category matches.
 */
export function classifyClause(text: string, rules: CompiledRule[], offset = 0): Classification | null {
  for (const category of CATEGORY_PRIORITY) {
    const matchedRuleIds: string[] = []
    const hits: TaggedHit[] = []

    for (const rule of rules) {
      if (rule.category !== category) continue
      const ruleHits = matchRule(rule, text)
      if (!ruleHits) continue
      matchedRuleIds.push(rule.id)
      for (const hit of ruleHits) hits.push({ ...hit, ruleId: rule.id })
    }

    if (matchedRuleIds.length > 0) {
      return { category, matchedRuleIds, evidence: mergeEvidence(hits, text, offset) }
    }
  }
  return null
}
