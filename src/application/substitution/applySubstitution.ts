import type { Recipe } from '@domain/models/Recipe.ts'
import type { RecipeIngredient } from '@domain/models/Ingredient.ts'
import type { ReadinessReport } from '@domain/models/ReadinessReport.ts'
import type { SubstitutionContext } from '@domain/models/Substitution.ts'
import { ValidationError } from '@domain/errors.ts'
import { normalizeIngredientName, normalizeToolName } from '@application/inventory/normalizeName.ts'
import { convertQuantity, roundQuantity } from '@application/units/convertQuantity.ts'

/**
 * Return a copy of `recipe` with one requirement swapped for another.
 * Quantity, unit and flags carry over and hints for the replaced target
 * are dropped. Steps are left as written.
 */
export function applySubstitution(
  recipe: Recipe,
  from: string,
  to: string,
  context: SubstitutionContext = 'ingredient',
): Recipe {
  const normalize = context === 'tool' ? normalizeToolName : normalizeIngredientName
  const source = normalize(from)
  const target = normalize(to)
  const required =
    context === 'tool' ? recipe.tools : recipe.ingredients.map((ing) => ing.ingredient)

  if (!required.includes(source)) {
    throw new ValidationError(recipe.id, [`${context} "${source}" is not used by this recipe`])
  }
  if (source === target) return recipe

  const substitutions = recipe.substitutions.filter(
    (hint) => !(hint.context === context && hint.for === source),
  )

  if (context === 'tool') {
    const tools = recipe.tools.map((tool) => (tool === source ? target : tool))
    return { ...recipe, tools: [...new Set(tools)], substitutions }
  }

  return { ...recipe, ingredients: swapIngredient(recipe.ingredients, source, target), substitutions }
}

/**
 * Rename `source` to `target`. When the recipe already uses `target`, the
 * two lines merge: amounts add up if their units are comparable, otherwise
 * the existing `target` line stands.
 */
function swapIngredient(
  ingredients: readonly RecipeIngredient[],
  source: string,
  target: string,
): RecipeIngredient[] {
  const replaced = ingredients.find((ing) => ing.ingredient === source)
  const existing = ingredients.find((ing) => ing.ingredient === target)
  if (!replaced) return [...ingredients]

  if (!existing) {
    return ingredients.map((ing) => (ing.ingredient === source ? { ...ing, ingredient: target } : ing))
  }

  const extra =
    existing.qty !== null && replaced.qty !== null
      ? convertQuantity(replaced.qty, replaced.unit, existing.unit)
      : null
  const merged: RecipeIngredient = {
    ...existing,
    qty: existing.qty !== null && extra !== null ? roundQuantity(existing.qty + extra) : existing.qty,
    optional: existing.optional && replaced.optional,
  }

  return ingredients
    .filter((ing) => ing.ingredient !== source)
    .map((ing) => (ing.ingredient === target ? merged : ing))
}

/** Apply every swap a readiness report settled on. */
export function adaptRecipe(recipe: Recipe, report: ReadinessReport): Recipe {
  if (report.recipeId !== recipe.id) {
    throw new ValidationError(recipe.id, [`report belongs to recipe "${report.recipeId}"`])
  }

  let adapted = recipe
  for (const tool of report.tools) {
    if (tool.substitute) adapted = applySubstitution(adapted, tool.tool, tool.substitute.name, 'tool')
  }
  for (const entry of report.ingredients) {
    if (entry.resolution === 'substitution' && entry.substitute) {
      adapted = applySubstitution(adapted, entry.ingredient, entry.substitute.name)
    }
  }
  return adapted
}
