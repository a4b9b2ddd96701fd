import unitData from '../../../data/units.json'

export type UnitFamily = 'volume' | 'mass' | 'count'

/** Canonical unit -> accepted spellings, as shipped in data/units.json. */
const UNIT_ALIASES: Record<string, string[]> = unitData.aliases

/** Volume conversions to teaspoons (base unit). */
export const VOLUME_TO_TSP: Record<string, number> = unitData.volumeToTeaspoons

/** Mass conversions to grams (base unit). */
export const MASS_TO_G: Record<string, number> = unitData.massToGrams

/** Maps every accepted spelling (and the canonical name itself) to the canonical unit. */
export const UNIT_MAP: ReadonlyMap<string, string> = new Map(
  Object.entries(UNIT_ALIASES).flatMap(([canonical, aliases]) => [
    [canonical, canonical] as const,
    ...aliases.map((alias) => [alias, canonical] as const),
  ]),
)

/** Count unit used when a quantity has no unit at all ("3 eggs"). */
export const BARE_COUNT_UNIT = 'piece'

export function isVolumeUnit(unit: string): boolean {
  return unit in VOLUME_TO_TSP
}

export function isMassUnit(unit: string): boolean {
  return unit in MASS_TO_G
}

/** Family of a canonical unit. No unit, or any non-volume/non-mass unit, counts. */
export function unitFamily(unit: string | null): UnitFamily {
  if (unit === null) return 'count'
  if (isVolumeUnit(unit)) return 'volume'
  if (isMassUnit(unit)) return 'mass'
  return 'count'
}

/** Display plural of a canonical unit ("cup" -> "cups", "pinch" -> "pinches"). */
export function pluralUnit(unit: string): string {
  return UNIT_ALIASES[unit]?.[0] ?? `${unit}s`
}
