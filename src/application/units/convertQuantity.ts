import {
  BARE_COUNT_UNIT,
  MASS_TO_G,
  VOLUME_TO_TSP,
  unitFamily,
  type UnitFamily,
} from '@domain/constants/units.ts'

const EPSILON = 1e-9

/** Count units compare by name; a missing unit is a bare count. */
function countUnit(unit: string | null): string {
  return unit ?? BARE_COUNT_UNIT
}

function basePerUnit(unit: string, family: UnitFamily): number {
  if (family === 'volume') return VOLUME_TO_TSP[unit]
  if (family === 'mass') return MASS_TO_G[unit]
  return 1
}

/**
 * Grouping key for amounts that can be summed: the family for volume and
 * mass, the count unit itself otherwise ("clove" and "can" never merge).
 */
export function unitKey(unit: string | null): string {
  const family = unitFamily(unit)
  return family === 'count' ? countUnit(unit) : family
}

export function areUnitsCompatible(a: string | null, b: string | null): boolean {
  return unitKey(a) === unitKey(b)
}

/**
 * Convert between canonical units of the same family. Returns null across
 * families (mass vs. count) or between different count units; callers
 * flag those instead of guessing.
 */
export function convertQuantity(qty: number, from: string | null, to: string | null): number | null {
  if (!areUnitsCompatible(from, to)) return null
  const family = unitFamily(from)
  if (family === 'count' || from === null || to === null) return qty
  return (qty * basePerUnit(from, family)) / basePerUnit(to, family)
}

/** `available >= required`, tolerant of conversion noise. */
export function isAtLeast(available: number, required: number): boolean {
  return available + EPSILON * Math.max(1, required) >= required
}

/** Round away float noise from conversions (0.30000000000000004 -> 0.3). */
export function roundQuantity(qty: number): number {
  return Math.round(qty * 1e6) / 1e6
}
