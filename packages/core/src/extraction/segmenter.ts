/**
 * Clause segmentation for agreement text.
 *
 * Cuts the document at sentence stops, blank lines, and clause markers, then
 * trims each piece down to its substantive text. Offsets refer to the
 * original document.
 */

export interface RawClause {
  start: number
  end: number
  text: string
  /** Stripped leading marker such as "(a)", "5.01" or "Section 7.2". */
  marker: string | null
}

export interface SegmenterOptions {
  minClauseTokens?: number
}

export interface Segmentation {
  clauses: RawClause[]
  /** Non-empty pieces below the token minimum. */
  fragments: RawClause[]
}

const DEFAULT_MIN_CLAUSE_TOKENS = 5

// ── Boundary patterns ──

const SENTENCE_STOP_RE = /[.!?;]+(?=\s|$)/g
const PARAGRAPH_BREAK_RE = /\r?\n[ \t]*\r?\n/g

const MARKER = '(?:\\((?:[ivxl]+|[a-z]|\\d{1,3})\\)|(?:[a-z]|\\d{1,3})\\)|\\d+\\.\\d+|\\d{1,3}\\.|Section\\s+\\d+(?:\\.\\d+)*)'

const LINE_MARKER_RE = new RegExp(`^[ \\t]*${MARKER}(?=\\s)`, 'gim')
const INLINE_MARKER_RE = /[:;](?=\s+(?:\((?:[ivxl]+|[a-z]|\d{1,3})\)|(?:[a-z]|\d{1,3})\))\s)/gi

const LEADING_MARKER_RE = new RegExp(`^${MARKER}(?=\\s|$)`, 'i')
const LEADING_CONJUNCTION_RE = /^(?:and|or|but)\b/i

/** Tokens whose trailing period is not a sentence stop. */
const ABBREVIATIONS = new Set([
  'no', 'nos', 'sec', 'sect', 'secs', 'art', 'para', 'cl', 'ch', 'ex', 'exh',
  'e.g', 'i.e', 'etc', 'vs', 'viz', 'cf', 'approx',
  'inc', 'ltd', 'co', 'corp', 'llc', 'l.l.c', 'l.p', 'n.a', 'u.s', 'u.s.a',
  'mr', 'ms', 'mrs', 'dr', 'st', 'jr', 'sr',
])

/** "Dec. 31, 2025": a month abbreviation only ends a sentence when no day follows. */
const MONTH_ABBREVIATIONS = new Set([
  'jan', 'feb', 'mar', 'apr', 'jun', 'jul', 'aug', 'sep', 'sept', 'oct', 'nov', 'dec',
])

// ── Boundary detection ──

function isLineStart(text: string, index: number): boolean {
  const lineStart = text.lastIndexOf('\n', index - 1) + 1
  return text.slice(lineStart, index).trim() === ''
}

function isFalseStop(text: string, stopIndex: number, stop: string): boolean {
  if (stop !== '.') return false
  const tokenStart = Math.max(text.lastIndexOf(' ', stopIndex - 1), text.lastIndexOf('\n', stopIndex - 1)) + 1
  const token = text.slice(tokenStart, stopIndex).replace(/^[("'“]+/, '').toLowerCase()
  if (token === '') return false
  if (ABBREVIATIONS.has(token)) return true
  if (MONTH_ABBREVIATIONS.has(token)) return /^\s+\d/.test(text.slice(stopIndex + 1))
  if (/^[a-z]$/.test(token)) return true
  // Numbering such as "3." or "5.01." at the start of a line is a marker, not a sentence end
  return /^\d+(?:\.\d+)*$/.test(token) && isLineStart(text, tokenStart)
}

/** The last non-whitespace character before `index`, or '' at the start of the text. */
function previousChar(text: string, index: number): string {
  const before = text.slice(0, index).trimEnd()
  return before.length > 0 ? before[before.length - 1] : ''
}

function findCuts(text: string): number[] {
  const cuts = new Set<number>([0, text.length])

  for (const m of text.matchAll(SENTENCE_STOP_RE)) {
    const index = m.index ?? 0
    if (!isFalseStop(text, index, m[0])) cuts.add(index + m[0].length)
  }
  for (const m of text.matchAll(PARAGRAPH_BREAK_RE)) {
    cuts.add(m.index ?? 0)
  }
  for (const m of text.matchAll(LINE_MARKER_RE)) {
    const index = m.index ?? 0
    // Only after a closing stop: a hard wrap that begins with "(30)" stays joined
    if ('.:;!?'.includes(previousChar(text, index)) || index === 0) cuts.add(index)
  }
  for (const m of text.matchAll(INLINE_MARKER_RE)) {
    cuts.add((m.index ?? 0) + 1)
  }

  return [...cuts].sort((a, b) => a - b)
}

// ── Clause cleanup ──

function skipWhitespace(text: string, index: number, end: number): number {
  let i = index
  while (i < end && /\s/.test(text[i])) i++
  return i
}

function toClause(text: string, pieceStart: number, pieceEnd: number): RawClause | null {
  let start = skipWhitespace(text, pieceStart, pieceEnd)
  let end = pieceEnd
  while (end > start && /\s/.test(text[end - 1])) end--
  if (start >= end) return null

  let marker: string | null = null
  for (;;) {
    const rest = text.slice(start, end)
    const conjunction = LEADING_CONJUNCTION_RE.exec(rest)
    const leadingMarker = conjunction ? null : LEADING_MARKER_RE.exec(rest)
    const consumed = conjunction ?? leadingMarker
    if (!consumed) break
    if (leadingMarker && marker === null) marker = leadingMarker[0].replace(/\s+/g, ' ')
    start = skipWhitespace(text, start + consumed[0].length, end)
  }
  if (start >= end) return null

  return { start, end, text: text.slice(start, end), marker }
}

export function countTokens(text: string): number {
  return text.split(/\s+/).filter(Boolean).length
}

/** Split agreement text into clauses in document order. */
export function segmentClauses(text: string, options: SegmenterOptions = {}): Segmentation {
  const minTokens = options.minClauseTokens ?? DEFAULT_MIN_CLAUSE_TOKENS
  const cuts = findCuts(text)
  const clauses: RawClause[] = []
  const fragments: RawClause[] = []

  for (let i = 0; i < cuts.length - 1; i++) {
    const clause = toClause(text, cuts[i], cuts[i + 1])
    if (!clause) continue
    if (countTokens(clause.text) < minTokens) fragments.push(clause)
    else clauses.push(clause)
  }

  return { clauses, fragments }
}
