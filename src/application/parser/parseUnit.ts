import { UNIT_MAP } from '@domain/constants/units.ts'

export interface UnitResult {
  unit: string | null         // canonical
  remainder: string
}

// Longest first so "fl oz" wins over "fl" and "tbsp" over "t"
const UNIT_KEYS = [...UNIT_MAP.keys()].sort((a, b) => b.length - a.length)

/** Canonical form of a unit spelling, or null when it is not a known unit. */
export function canonicalUnit(unit: string): string | null {
  return UNIT_MAP.get(unit.trim().toLowerCase().replace(/\.$/, '')) ?? null
}

/**
 * Parse a unit from the front of a string ("cups milk" -> cup, "milk").
 * Single-letter units only match when followed by a space, period or the end.
 */
export function parseUnit(text: string): UnitResult {
  const trimmed = text.trim()
  const lower = trimmed.toLowerCase()

  for (const key of UNIT_KEYS) {
    if (!lower.startsWith(key)) continue

    const nextChar = lower[key.length]
    if (nextChar && /[a-z]/.test(nextChar)) continue
    if (key.length === 1 && nextChar && nextChar !== '.' && nextChar !== ' ') continue

    const remainder = trimmed.slice(key.length).replace(/^\.?\s*/, '')
    // "5 g" alone is a unit with no ingredient; treat the word as the name instead
    if (!remainder) break
    return { unit: UNIT_MAP.get(key) ?? null, remainder }
  }

  return { unit: null, remainder: trimmed }
}
