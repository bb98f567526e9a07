import { numericQuantity } from 'numeric-quantity'

/** Unicode fraction map for normalization. */
const UNICODE_FRACTIONS: Record<string, string> = {
  '\u00BC': '1/4',  // ¼
  '\u00BD': '1/2',  // ½
  '\u00BE': '3/4',  // ¾
  '\u2153': '1/3',  // ⅓
  '\u2154': '2/3',  // ⅔
  '\u215B': '1/8',  // ⅛
  '\u215C': '3/8',  // ⅜
  '\u215D': '5/8',  // ⅝
  '\u215E': '7/8',  // ⅞
}

/** Replace unicode fraction characters with ASCII equivalents. */
export function normalizeUnicodeFractions(text: string): string {
  let result = text
  for (const [unicode, ascii] of Object.entries(UNICODE_FRACTIONS)) {
    // "1½" → "1 1/2"
    result = result.replace(new RegExp(`(\\d)${unicode}`, 'g'), `$1 ${ascii}`)
    result = result.replace(new RegExp(unicode, 'g'), ascii)
  }
  return result
}

const NUMBER = String.raw`\d+\s+\d+\/\d+|\d+\/\d+|\d*\.\d+|\d+`

/** Mixed number, fraction, decimal or integer at the start of a string. */
const QTY_PATTERN = new RegExp(`^(${NUMBER})`)

/** "3-4", "1/2 to 3/4": two quantities separated by a dash or "to". */
const RANGE_PATTERN = new RegExp(`^(${NUMBER})\\s*(?:[-–—]|to\\b)\\s*(${NUMBER})`)

export interface QuantityResult {
  qty: number | null
  remainder: string
}

/**
 * Convert a matched quantity to a number. Zero denominators, zero and
 * non-finite values are rejected so the caller can fall back.
 */
function toQuantity(text: string): number | null {
  if (/\/0+$/.test(text)) return null
  const padded = text.startsWith('.') ? `0${text}` : text
  const value = numericQuantity(padded)
  if (!Number.isFinite(value) || value <= 0) return null
  return value
}

/**
 * Parse a positive quantity from the front of a string. Ranges resolve to
 * their upper bound so the shopping list never comes up short.
 */
export function parseQuantity(text: string): QuantityResult {
  const trimmed = text.trim()

  const rangeMatch = trimmed.match(RANGE_PATTERN)
  if (rangeMatch) {
    const min = toQuantity(rangeMatch[1])
    const max = toQuantity(rangeMatch[2])
    if (min !== null && max !== null) {
      const remainder = trimmed.slice(rangeMatch[0].length).trim()
      return { qty: Math.max(min, max), remainder }
    }
  }

  const qtyMatch = trimmed.match(QTY_PATTERN)
  if (qtyMatch) {
    const value = toQuantity(qtyMatch[1])
    if (value !== null) {
      const remainder = trimmed.slice(qtyMatch[0].length).trim()
      return { qty: value, remainder }
    }
  }

  return { qty: null, remainder: trimmed }
}
