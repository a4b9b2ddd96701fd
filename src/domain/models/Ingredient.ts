import type { UnitFamily } from '@domain/constants/units.ts'

export interface RecipeIngredient {
  ingredient: string          // canonical name (identity)
  qty: number | null          // null = unmeasured ("salt to taste")
  unit: string | null         // canonical unit
  family: UnitFamily
  optional: boolean
  strict: boolean             // an unspecified pantry amount does not satisfy qty
}
