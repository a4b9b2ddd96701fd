import type { Alternative } from './Substitution.ts'

export type ReadinessStatus = 'Ready' | 'ReadyWithSubstitution' | 'Missing'

/**
 * `none`: satisfied from the pantry. `substitution`: an owned alternative covers it.
 * `unresolved`: goes to the shopping list. `skipped`: optional and unavailable.
 */
export type Resolution = 'none' | 'substitution' | 'unresolved' | 'skipped'

export interface UnitIncompatibilityWarning {
  kind: 'unit-incompatible'
  ingredient: string
  requiredUnit: string | null
  availableUnit: string | null
}

export interface IngredientReadiness {
  ingredient: string
  requiredQty: number | null
  unit: string | null
  availableQty: number | null   // in the recipe's unit; null when absent or not comparable
  excluded: boolean
  optional: boolean
  resolution: Resolution
  substitute: Alternative | null
  shortfall: number | null      // what to buy, in the recipe's unit
  warning: UnitIncompatibilityWarning | null
}

export type ToolCompatibility = 'direct' | 'substitution' | 'incompatible'

export interface ToolReadiness {
  tool: string
  owned: boolean
  substitute: Alternative | null
}

export interface ReadinessReport {
  recipeId: string
  recipeName: string
  status: ReadinessStatus
  score: number
  toolCompatibility: ToolCompatibility
  toolCompatible: boolean
  tools: ToolReadiness[]
  ingredients: IngredientReadiness[]
  warnings: UnitIncompatibilityWarning[]
}
