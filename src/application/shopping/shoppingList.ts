import type { Recipe } from '@domain/models/Recipe.ts'
import type { ReadinessReport } from '@domain/models/ReadinessReport.ts'
import type { RecipeContribution, ShoppingList, ShoppingListEntry } from '@domain/models/ShoppingList.ts'
import { NotFoundError, ValidationError } from '@domain/errors.ts'
import { canonicalUnit } from '@application/parser/parseUnit.ts'
import { normalizeIngredientName } from '@application/inventory/normalizeName.ts'
import { convertQuantity, roundQuantity, unitKey } from '@application/units/convertQuantity.ts'

export function createShoppingList(id: string): ShoppingList {
  return { id, entries: [] }
}

/** Entries merge by ingredient and by the unit family their amounts can be summed in. */
export function entryKey(ingredient: string, unit: string | null): string {
  return `${ingredient}|${unitKey(unit)}`
}

export function findEntry(list: ShoppingList, key: string): ShoppingListEntry | undefined {
  return list.entries.find((entry) => entry.key === key)
}

/** Recompute the derived fields from contributions and the manual portion. */
function settle(entry: ShoppingListEntry): ShoppingListEntry {
  const amounts = entry.contributions.flatMap((c) => (c.qty === null ? [] : [c.qty]))
  if (entry.manualQty !== null) amounts.push(entry.manualQty)

  return {
    ...entry,
    quantityNeeded: amounts.length === 0 ? null : roundQuantity(amounts.reduce((sum, q) => sum + q, 0)),
    sourceRecipeIds: [...new Set(entry.contributions.map((c) => c.recipeId))].sort(),
  }
}

function isOrphan(entry: ShoppingListEntry): boolean {
  return entry.contributions.length === 0 && !entry.manual
}

function byIngredient(a: ShoppingListEntry, b: ShoppingListEntry): number {
  return a.ingredient.localeCompare(b.ingredient) || a.key.localeCompare(b.key)
}

function withEntries(list: ShoppingList, entries: ShoppingListEntry[]): ShoppingList {
  return { ...list, entries: entries.sort(byIngredient) }
}

function blankEntry(ingredient: string, unit: string | null): ShoppingListEntry {
  return {
    key: entryKey(ingredient, unit),
    ingredient,
    unit,
    quantityNeeded: null,
    sourceRecipeIds: [],
    contributions: [],
    manual: false,
    manualQty: null,
    completed: false,
  }
}

/** Amount expressed in the entry's unit. Same key guarantees the units convert. */
function inEntryUnit(entry: ShoppingListEntry, qty: number | null, unit: string | null): number | null {
  if (qty === null) return null
  return roundQuantity(convertQuantity(qty, unit, entry.unit) ?? qty)
}

/**
 * Drop one recipe's share of every entry. Entries nothing else needs go
 * away; entries with a manual portion stay even at zero recipe demand.
 * An entry the recipe reopened goes back to completed.
 */
export function removeRecipeContribution(list: ShoppingList, recipeId: string): ShoppingList {
  const entries: ShoppingListEntry[] = []
  for (const entry of list.entries) {
    const contributions = entry.contributions.filter((c) => c.recipeId !== recipeId)
    if (contributions.length === entry.contributions.length) {
      entries.push(entry)
      continue
    }
    const reopened = entry.contributions.some((c) => c.recipeId === recipeId && c.reopened)
    const updated = settle({ ...entry, contributions, completed: entry.completed || reopened })
    if (!isOrphan(updated)) entries.push(updated)
  }
  return withEntries(list, entries)
}

/**
 * Put a recipe's unresolved needs on the list. Lines covered by a
 * substitution, optional lines, and excluded ingredients are not bought.
 * Adding the same recipe again replaces its earlier share, and an entry
 * that gains new demand is reopened.
 */
export function addFromRecipe(list: ShoppingList, report: ReadinessReport, recipe: Recipe): ShoppingList {
  if (report.recipeId !== recipe.id) {
    throw new ValidationError(recipe.id, [`report belongs to recipe "${report.recipeId}"`])
  }

  const base = removeRecipeContribution(list, recipe.id)
  const byKey = new Map(base.entries.map((entry) => [entry.key, entry]))

  for (const line of report.ingredients) {
    if (line.resolution !== 'unresolved' || line.excluded) continue

    const key = entryKey(line.ingredient, line.unit)
    const entry = byKey.get(key) ?? blankEntry(line.ingredient, line.unit)
    const contribution: RecipeContribution = {
      recipeId: recipe.id,
      qty: inEntryUnit(entry, line.shortfall, line.unit),
      reopened: entry.completed,
    }
    byKey.set(key, settle({
      ...entry,
      contributions: [...entry.contributions, contribution],
      completed: false,
    }))
  }

  return withEntries(base, [...byKey.values()])
}

export function toggleCompleted(list: ShoppingList, key: string): ShoppingList {
  if (!findEntry(list, key)) throw new NotFoundError('shopping-entry', key)
  return withEntries(
    list,
    list.entries.map((entry) => (entry.key === key ? { ...entry, completed: !entry.completed } : entry)),
  )
}

/** Add something by hand. Manual entries are never removed by recipe changes. */
export function addManual(
  list: ShoppingList,
  ingredient: string,
  qty: number | null = null,
  unit: string | null = null,
): ShoppingList {
  const name = normalizeIngredientName(ingredient)
  const issues: string[] = []
  if (!name) issues.push('ingredient name must not be empty')
  if (qty !== null && !(qty > 0)) issues.push(`quantity for "${name}" must be positive`)
  const canonical = unit === null ? null : canonicalUnit(unit)
  if (unit !== null && canonical === null) issues.push(`unknown unit "${unit}"`)
  if (issues.length > 0) throw new ValidationError(null, issues)

  const key = entryKey(name, canonical)
  const entry = findEntry(list, key) ?? blankEntry(name, canonical)
  const added = inEntryUnit(entry, qty, canonical)
  const manualQty =
    added === null ? entry.manualQty : roundQuantity((entry.manualQty ?? 0) + added)

  const updated = settle({ ...entry, manual: true, manualQty, completed: false })
  return withEntries(list, [...list.entries.filter((e) => e.key !== key), updated])
}

/**
 * Take back what was added by hand for an ingredient (every unit, or only
 * the given unit's family). Recipe-derived demand is untouched.
 */
export function removeManual(list: ShoppingList, ingredient: string, unit: string | null = null): ShoppingList {
  const name = normalizeIngredientName(ingredient)
  const canonical = unit === null ? null : canonicalUnit(unit)
  if (unit !== null && canonical === null) throw new ValidationError(null, [`unknown unit "${unit}"`])
  const onlyKey = unit === null ? null : entryKey(name, canonical)

  const entries: ShoppingListEntry[] = []
  for (const entry of list.entries) {
    const matches = entry.ingredient === name && entry.manual && (onlyKey === null || entry.key === onlyKey)
    if (!matches) {
      entries.push(entry)
      continue
    }
    const updated = settle({ ...entry, manual: false, manualQty: null })
    if (!isOrphan(updated)) entries.push(updated)
  }
  return withEntries(list, entries)
}

/** Completed entries stay until cleared so a check-off can be undone. */
export function clearCompleted(list: ShoppingList): ShoppingList {
  return withEntries(list, list.entries.filter((entry) => !entry.completed))
}
