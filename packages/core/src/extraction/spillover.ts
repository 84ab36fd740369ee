/**
 * Spillover detection: a deadline phrase that sits after a second obligation
 * cue may belong to a clause the segmenter failed to split off.
 */

import type { DeadlineDescriptor } from '../deadlines/index.js'
import type { ReviewFlag } from '../obligations/index.js'

const OBLIGATION_CUE_RE = /\b(?:shall|must|will|agrees? to|covenants? to|undertakes? to)\b/gi

/** One flag per descriptor that starts after the clause's second obligation cue. */
export function detectSpillover(clauseText: string, descriptors: DeadlineDescriptor[]): ReviewFlag[] {
  const cues = [...clauseText.matchAll(OBLIGATION_CUE_RE)]
  if (cues.length < 2) return []

  const second = cues[1]
  const secondAt = second.index ?? 0
  return descriptors
    .filter((d) => d.start >= secondAt)
    .map((d) => ({
      code: 'possible-false-attachment' as const,
      detail: `deadline "${d.sourceText}" follows a second obligation cue "${second[0]}" at offset ${secondAt}`,
    }))
}
