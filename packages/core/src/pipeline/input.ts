/**
 * Document text validation. Empty text is valid and yields no obligations;
 * binary or garbled input is rejected before extraction.
 */

import { Err, Ok, TrackerError } from '../common/index.js'
import type { Result } from '../common/index.js'

/** Share of control or replacement characters above which text is treated as binary. */
export const MAX_CONTROL_RATIO = 0.05

// Tab, LF and CR are ordinary text
const CONTROL_CHAR_RE = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F\uFFFD]/g

export function validateDocumentText(input: unknown): Result<string> {
  if (typeof input !== 'string') {
    return Err(TrackerError.input(`Document text must be a string, got ${input === null ? 'null' : typeof input}`))
  }
  if (input.includes('\u0000')) {
    return Err(TrackerError.input('Document contains NUL bytes; expected plain text'))
  }
  if (input.length > 0) {
    const controls = input.match(CONTROL_CHAR_RE)?.length ?? 0
    if (controls / input.length > MAX_CONTROL_RATIO) {
      return Err(TrackerError.input(`Document looks like binary data: ${controls} of ${input.length} characters are control or replacement characters`))
    }
  }
  return Ok(input)
}
