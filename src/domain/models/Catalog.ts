import type { Recipe } from './Recipe.ts'
import type { SubstitutionTable } from './Substitution.ts'

/** Versioned snapshot, built once and never mutated. */
export interface RecipeCatalog {
  version: string
  recipes: ReadonlyMap<string, Recipe>
  substitutions: SubstitutionTable
}
