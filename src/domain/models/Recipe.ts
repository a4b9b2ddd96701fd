import type { RecipeIngredient } from './Ingredient.ts'
import type { SubstitutionContext } from './Substitution.ts'

export interface SubstitutionHint {
  for: string
  alternatives: string[]      // author-declared order, best first
  context: SubstitutionContext
}

/** Immutable catalog entry. Steps are opaque text. */
export interface Recipe {
  id: string
  name: string
  steps: string[]
  ingredients: RecipeIngredient[]
  tools: string[]
  substitutions: SubstitutionHint[]
}
