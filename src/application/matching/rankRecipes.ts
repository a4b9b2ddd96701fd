import type { InventoryProfile } from '@domain/models/Inventory.ts'
import type { RecipeCatalog } from '@domain/models/Catalog.ts'
import type { ReadinessReport } from '@domain/models/ReadinessReport.ts'
import { compareIds, getRecipe, listRecipes } from '@application/catalog/buildCatalog.ts'
import { normalizeIngredientName } from '@application/inventory/normalizeName.ts'
import { evaluateRecipe } from './evaluateRecipe.ts'
import { resolveMatchOptions, type MatchOptions } from './matchOptions.ts'

/** Best first; equal scores fall back to ascending recipe id. */
export function compareReports(a: ReadinessReport, b: ReadinessReport): number {
  if (a.score !== b.score) return b.score - a.score
  return compareIds(a.recipeId, b.recipeId)
}

/** Evaluate every catalog recipe and order the reports. */
export function rankRecipes(
  inventory: InventoryProfile,
  catalog: RecipeCatalog,
  options: Partial<MatchOptions> = {},
): ReadinessReport[] {
  return listRecipes(catalog)
    .map((recipe) => evaluateRecipe(inventory, recipe, catalog.substitutions, options))
    .sort(compareReports)
}

/** Readiness of a single recipe. Throws NotFoundError for an unknown id. */
export function matchRecipe(
  inventory: InventoryProfile,
  catalog: RecipeCatalog,
  recipeId: string,
  options: Partial<MatchOptions> = {},
): ReadinessReport {
  return evaluateRecipe(inventory, getRecipe(catalog, recipeId), catalog.substitutions, options)
}

export interface RecommendRequest extends Partial<MatchOptions> {
  /** Only consider recipes that use at least one of these ingredients. */
  include?: string[]
  /** Overrides `recommendLimit`. */
  limit?: number
}

export interface Recommendation {
  best: ReadinessReport | null
  others: ReadinessReport[]
}

/**
 * True when the recipe needs an ingredient the user excluded and no
 * usable substitute covers it.
 */
export function requiresExcluded(report: ReadinessReport): boolean {
  return report.ingredients.some(
    (entry) => !entry.optional && entry.excluded && entry.resolution === 'unresolved',
  )
}

/**
 * Pick the best recipe for a pantry plus a few runners-up, optionally
 * narrowed to recipes that use something the user wants to cook with.
 * Recipes that depend on an excluded ingredient are never recommended.
 */
export function recommendRecipes(
  inventory: InventoryProfile,
  catalog: RecipeCatalog,
  request: RecommendRequest = {},
): Recommendation {
  const { include = [], limit, ...rest } = request
  const options = resolveMatchOptions(rest)
  const wanted = new Set(include.map(normalizeIngredientName).filter(Boolean))
  const max = Math.max(0, limit ?? options.recommendLimit)

  const reports = listRecipes(catalog)
    .filter(
      (recipe) =>
        wanted.size === 0 || recipe.ingredients.some((ing) => wanted.has(ing.ingredient)),
    )
    .map((recipe) => evaluateRecipe(inventory, recipe, catalog.substitutions, options))
    .filter((report) => !requiresExcluded(report))
    .sort(compareReports)
    .slice(0, max)

  return { best: reports[0] ?? null, others: reports.slice(1) }
}
