import type { InventoryItem, InventoryProfile } from '@domain/models/Inventory.ts'
import type { RecipeIngredient } from '@domain/models/Ingredient.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import type { SubstitutionTable } from '@domain/models/Substitution.ts'
import type {
  IngredientReadiness,
  ReadinessReport,
  ReadinessStatus,
  ToolCompatibility,
  ToolReadiness,
  UnitIncompatibilityWarning,
} from '@domain/models/ReadinessReport.ts'
import { bestAvailable, resolveSubstitutions } from '@application/substitution/resolveSubstitutions.ts'
import { convertQuantity, isAtLeast, roundQuantity } from '@application/units/convertQuantity.ts'
import { resolveMatchOptions, type MatchOptions } from './matchOptions.ts'

/** Highest score a recipe needing any substitution can reach; Ready is 1. */
export const SUBSTITUTION_SCORE_CEILING = 0.99
/** Weight of the resolved fraction for Missing recipes; stays below 0.5. */
export const MISSING_SCORE_WEIGHT = 0.4

const EMPTY_RULES: SubstitutionTable = new Map()

interface Supply {
  sufficient: boolean
  availableQty: number | null
  warning: UnitIncompatibilityWarning | null
}

/**
 * Does the pantry cover this line? An unspecified amount gets the benefit
 * of the doubt unless the recipe marks the line strict. Amounts in
 * incompatible units are never converted: the line is flagged instead.
 */
function checkSupply(ing: RecipeIngredient, item: InventoryItem | undefined): Supply {
  if (!item) return { sufficient: false, availableQty: null, warning: null }
  if (item.qty === null) return { sufficient: ing.qty === null || !ing.strict, availableQty: null, warning: null }

  const available = convertQuantity(item.qty, item.unit, ing.unit)
  if (ing.qty === null) {
    return { sufficient: true, availableQty: available === null ? null : roundQuantity(available), warning: null }
  }
  if (available === null) {
    return {
      sufficient: false,
      availableQty: null,
      warning: {
        kind: 'unit-incompatible',
        ingredient: ing.ingredient,
        requiredUnit: ing.unit,
        availableUnit: item.unit,
      },
    }
  }
  return { sufficient: isAtLeast(available, ing.qty), availableQty: roundQuantity(available), warning: null }
}

function shortfall(ing: RecipeIngredient, supply: Supply, excluded: boolean): number | null {
  if (ing.qty === null) return null
  if (excluded || supply.availableQty === null) return ing.qty
  return roundQuantity(Math.max(0, ing.qty - supply.availableQty))
}

function toolCompatibility(tools: ToolReadiness[]): ToolCompatibility {
  if (tools.every((t) => t.owned)) return 'direct'
  if (tools.every((t) => t.owned || t.substitute !== null)) return 'substitution'
  return 'incompatible'
}

function deriveStatus(
  compatibility: ToolCompatibility,
  ingredients: IngredientReadiness[],
): ReadinessStatus {
  if (compatibility === 'incompatible') return 'Missing'
  const required = ingredients.filter((entry) => !entry.optional)
  if (required.some((entry) => entry.resolution === 'unresolved')) return 'Missing'

  // optional lines never change the status, substituted or not
  const substituted =
    compatibility === 'substitution' ||
    required.some((entry) => entry.resolution === 'substitution')
  return substituted ? 'ReadyWithSubstitution' : 'Ready'
}

function deriveScore(
  status: ReadinessStatus,
  tools: ToolReadiness[],
  ingredients: IngredientReadiness[],
): number {
  if (status === 'Ready') return 1

  if (status === 'ReadyWithSubstitution') {
    const scores = [
      ...tools.flatMap((t) => (t.substitute ? [t.substitute.score] : [])),
      ...ingredients.flatMap((e) =>
        !e.optional && e.resolution === 'substitution' && e.substitute ? [e.substitute.score] : [],
      ),
    ]
    const average = scores.reduce((sum, s) => sum + s, 0) / scores.length
    return roundQuantity(Math.min(SUBSTITUTION_SCORE_CEILING, 0.5 + 0.5 * average))
  }

  const required = ingredients.filter((entry) => !entry.optional)
  const resolved = required.filter((e) => e.resolution === 'none' || e.resolution === 'substitution')
  const fraction = required.length === 0 ? 1 : resolved.length / required.length
  return roundQuantity(fraction * MISSING_SCORE_WEIGHT)
}

/**
 * Readiness of one recipe against a pantry snapshot. Pure: the same inputs
 * always produce the same report.
 */
export function evaluateRecipe(
  inventory: InventoryProfile,
  recipe: Recipe,
  rules: SubstitutionTable = EMPTY_RULES,
  options: Partial<MatchOptions> = {},
): ReadinessReport {
  const opts = resolveMatchOptions(options)
  const pantry = new Map(inventory.ingredients.map((item) => [item.name, item]))
  const excluded = new Set(inventory.exclusions)
  const owned = new Set(inventory.tools)
  const usable = (name: string) => pantry.has(name) && !excluded.has(name)

  const tools: ToolReadiness[] = recipe.tools.map((tool) => {
    if (owned.has(tool)) return { tool, owned: true, substitute: null }
    const alternatives = resolveSubstitutions(tool, 'tool', recipe, rules, inventory.exclusions, opts)
    return { tool, owned: false, substitute: bestAvailable(alternatives, (name) => owned.has(name)) }
  })

  const ingredients: IngredientReadiness[] = recipe.ingredients.map((ing) => {
    const isExcluded = excluded.has(ing.ingredient)
    const supply = checkSupply(ing, pantry.get(ing.ingredient))
    const entry: IngredientReadiness = {
      ingredient: ing.ingredient,
      requiredQty: ing.qty,
      unit: ing.unit,
      availableQty: supply.availableQty,
      excluded: isExcluded,
      optional: ing.optional,
      resolution: 'none',
      substitute: null,
      shortfall: null,
      warning: supply.warning,
    }
    if (!isExcluded && supply.sufficient) return entry

    const alternatives = resolveSubstitutions(ing.ingredient, 'ingredient', recipe, rules, inventory.exclusions, opts)
    const substitute = bestAvailable(alternatives, usable)
    if (substitute) return { ...entry, resolution: 'substitution', substitute }
    if (ing.optional) return { ...entry, resolution: 'skipped' }
    return { ...entry, resolution: 'unresolved', shortfall: shortfall(ing, supply, isExcluded) }
  })

  const compatibility = toolCompatibility(tools)
  const status = deriveStatus(compatibility, ingredients)

  return {
    recipeId: recipe.id,
    recipeName: recipe.name,
    status,
    score: deriveScore(status, tools, ingredients),
    toolCompatibility: compatibility,
    toolCompatible: compatibility !== 'incompatible',
    tools,
    ingredients,
    warnings: ingredients.flatMap((entry) => (entry.warning ? [entry.warning] : [])),
  }
}
