import type { Recipe } from '@domain/models/Recipe.ts'
import type { RecipeCatalog } from '@domain/models/Catalog.ts'
import { ruleKey, type SubstitutionRule } from '@domain/models/Substitution.ts'
import { NotFoundError, ValidationError } from '@domain/errors.ts'
import { ingestRecipe, ingestSubstitutionRule } from './ingestRecipe.ts'

export interface CatalogSource {
  version: string
  recipes: unknown[]
  substitutions?: unknown[]
}

export interface CatalogBuildResult {
  catalog: RecipeCatalog
  rejections: ValidationError[]
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) deepFreeze(child)
  }
  return value
}

function toValidationError(err: unknown): ValidationError {
  if (err instanceof ValidationError) return err
  throw err
}

/**
 * Ingest raw recipes and global rules into an immutable catalog snapshot.
 * Invalid entries are rejected, reported and logged; they never reach matching.
 */
export function buildCatalog(source: CatalogSource): CatalogBuildResult {
  const rejections: ValidationError[] = []
  const recipes = new Map<string, Recipe>()
  const substitutions = new Map<string, SubstitutionRule>()

  for (const raw of source.recipes) {
    try {
      const recipe = ingestRecipe(raw)
      if (recipes.has(recipe.id)) {
        throw new ValidationError(recipe.id, ['duplicate recipe id'])
      }
      recipes.set(recipe.id, deepFreeze(recipe))
    } catch (err) {
      rejections.push(toValidationError(err))
    }
  }

  for (const raw of source.substitutions ?? []) {
    try {
      const rule = ingestSubstitutionRule(raw)
      const key = ruleKey(rule.context, rule.target)
      if (substitutions.has(key)) {
        throw new ValidationError(null, [`duplicate rule for ${rule.context} "${rule.target}"`])
      }
      substitutions.set(key, deepFreeze(rule))
    } catch (err) {
      rejections.push(toValidationError(err))
    }
  }

  for (const rejection of rejections) {
    console.warn(`[Larder] catalog ${source.version}: ${rejection.message}`)
  }

  const catalog: RecipeCatalog = Object.freeze({
    version: source.version,
    recipes,
    substitutions,
  })
  return { catalog, rejections }
}

/** Index already-validated rules by context and target. */
export function indexRules(rules: SubstitutionRule[]): Map<string, SubstitutionRule> {
  return new Map(rules.map((rule) => [ruleKey(rule.context, rule.target), rule]))
}

export function getRecipe(catalog: RecipeCatalog, id: string): Recipe {
  const recipe = catalog.recipes.get(id)
  if (!recipe) throw new NotFoundError('recipe', id)
  return recipe
}

/** Every recipe, ascending by id. */
export function listRecipes(catalog: RecipeCatalog): Recipe[] {
  return [...catalog.recipes.values()].sort((a, b) => compareIds(a.id, b.id))
}

export function compareIds(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
