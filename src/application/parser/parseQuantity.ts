import { numericQuantity } from 'numeric-quantity'

const VULGAR_FRACTIONS: Record<string, string> = {
  '¼': '1/4',
  '½': '1/2',
  '¾': '3/4',
  '⅓': '1/3',
  '⅔': '2/3',
  '⅛': '1/8',
  '⅜': '3/8',
  '⅝': '5/8',
  '⅞': '7/8',
}

const VULGAR_PATTERN = new RegExp(`(\\d?)([${Object.keys(VULGAR_FRACTIONS).join('')}])`, 'g')

// "1½" -> "1 1/2", "½" -> "1/2"
export function normalizeUnicodeFractions(text: string): string {
  return text.replace(VULGAR_PATTERN, (_match, digit: string, glyph: string) => {
    const ascii = VULGAR_FRACTIONS[glyph] ?? glyph
    return digit ? `${digit} ${ascii}` : ascii
  })
}

const NUMBER = String.raw`\d+\s+\d+\/\d+|\d+\/\d+|\d+\.\d+|\d+`
const QTY_PATTERN = new RegExp(`^(${NUMBER})`)
const RANGE_PATTERN = new RegExp(`^(${NUMBER})\\s*(?:[-–—]|to)\\s*(${NUMBER})`)

export interface QuantityResult {
  qty: number | null
  remainder: string
}

/**
 * Parse a quantity from the front of a string. A range ("2-3 eggs")
 * yields its lower bound: that much is certainly on hand.
 */
export function parseQuantity(text: string): QuantityResult {
  const trimmed = normalizeUnicodeFractions(text.trim())

  const rangeMatch = trimmed.match(RANGE_PATTERN)
  if (rangeMatch) {
    const min = numericQuantity(rangeMatch[1])
    if (!isNaN(min)) {
      return { qty: min, remainder: trimmed.slice(rangeMatch[0].length).trim() }
    }
  }

  const qtyMatch = trimmed.match(QTY_PATTERN)
  if (qtyMatch) {
    const value = numericQuantity(qtyMatch[1])
    if (!isNaN(value)) {
      return { qty: value, remainder: trimmed.slice(qtyMatch[0].length).trim() }
    }
  }

  return { qty: null, remainder: trimmed }
}
