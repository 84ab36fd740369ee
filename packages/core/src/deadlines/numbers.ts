/**
 * Quantities as written in agreements: "45", "thirty (30)", "forty-five", "one hundred twenty".
 */

const SMALL: Record<string, number> = {
  zero: 0, one: 1, two: 2, three: 3, four: 4, five: 5, six: 6, seven: 7, eight: 8, nine: 9,
  ten: 10, eleven: 11, twelve: 12, thirteen: 13, fourteen: 14, fifteen: 15, sixteen: 16,
  seventeen: 17, eighteen: 18, nineteen: 19,
}

const TENS: Record<string, number> = {
  twenty: 20, thirty: 30, forty: 40, fifty: 50, sixty: 60, seventy: 70, eighty: 80, ninety: 90,
}

function parseNumberWords(raw: string): number | null {
  const words = raw.toLowerCase().split(/[\s-]+/).filter(Boolean)
  if (words.length === 0) return null

  let total = 0
  for (const word of words) {
    if (word === 'and') continue
    if (word in SMALL) total += SMALL[word]
    else if (word in TENS) total += TENS[word]
    else if (word === 'hundred') total = (total || 1) * 100
    else return null
  }
  return total
}

/** Parse a written quantity. A parenthesised figure wins over the words before it. */
export function parseQuantity(raw: string): number | null {
  const trimmed = raw.trim()
  const paren = /\((\d+)\)$/.exec(trimmed)
  if (paren) return parseInt(paren[1], 10)
  if (/^\d+$/.test(trimmed)) return parseInt(trimmed, 10)
  return parseNumberWords(trimmed)
}
