import { z } from 'zod'
import type { InventoryItem, InventoryProfile } from '@domain/models/Inventory.ts'
import { ValidationError } from '@domain/errors.ts'
import { canonicalUnit } from '@application/parser/parseUnit.ts'
import { formatZodIssues } from '@application/validation/zodIssues.ts'
import { parseInventoryEntry } from '@application/parser/parseInventoryEntry.ts'
import {
  areUnitsCompatible,
  convertQuantity,
  isAtLeast,
  roundQuantity,
} from '@application/units/convertQuantity.ts'
import { normalizeIngredientName, normalizeToolName, splitEntryList } from './normalizeName.ts'

export function createInventory(): InventoryProfile {
  return { ingredients: [], tools: [], exclusions: [] }
}

function byName(a: InventoryItem, b: InventoryItem): number {
  return a.name.localeCompare(b.name)
}

function withItems(inventory: InventoryProfile, items: InventoryItem[]): InventoryProfile {
  return { ...inventory, ingredients: items.sort(byName) }
}

function resolveUnit(unit: string | null): string | null {
  if (unit === null) return null
  const canonical = canonicalUnit(unit)
  if (!canonical) throw new ValidationError(null, [`unknown unit "${unit}"`])
  return canonical
}

function addToSet(values: string[], value: string): string[] {
  if (!value || values.includes(value)) return values
  return [...values, value].sort()
}

export function findIngredient(inventory: InventoryProfile, name: string): InventoryItem | undefined {
  const key = normalizeIngredientName(name)
  return inventory.ingredients.find((item) => item.name === key)
}

export function hasTool(inventory: InventoryProfile, tool: string): boolean {
  return inventory.tools.includes(normalizeToolName(tool))
}

export function isExcluded(inventory: InventoryProfile, ingredient: string): boolean {
  return inventory.exclusions.includes(normalizeIngredientName(ingredient))
}

/**
 * Record that an ingredient is on hand. Amounts in the same unit family are
 * summed in the existing entry's unit; an unspecified amount never erases a
 * recorded one; an amount in another family replaces the entry.
 */
export function addIngredient(
  inventory: InventoryProfile,
  name: string,
  qty: number | null = null,
  unit: string | null = null,
): InventoryProfile {
  const key = normalizeIngredientName(name)
  if (!key) return inventory
  if (qty !== null && !(qty > 0)) {
    throw new ValidationError(null, [`quantity for "${key}" must be positive`])
  }
  const canonical = qty === null ? null : resolveUnit(unit)
  const others = inventory.ingredients.filter((item) => item.name !== key)
  const existing = inventory.ingredients.find((item) => item.name === key)
  const incoming: InventoryItem = { name: key, qty, unit: canonical }

  if (!existing || existing.qty === null) return withItems(inventory, [...others, incoming])
  if (qty === null) return inventory

  const converted = convertQuantity(qty, canonical, existing.unit)
  if (converted === null) return withItems(inventory, [...others, incoming])

  return withItems(inventory, [
    ...others,
    { ...existing, qty: roundQuantity(existing.qty + converted) },
  ])
}

/**
 * Use up an ingredient. Without an amount the entry is dropped; with one it
 * is subtracted and the entry disappears once nothing is left.
 */
export function removeIngredient(
  inventory: InventoryProfile,
  name: string,
  qty: number | null = null,
  unit: string | null = null,
): InventoryProfile {
  const key = normalizeIngredientName(name)
  const existing = inventory.ingredients.find((item) => item.name === key)
  if (!existing) return inventory

  const others = inventory.ingredients.filter((item) => item.name !== key)
  if (qty === null || existing.qty === null) return withItems(inventory, others)

  const canonical = resolveUnit(unit)
  if (!areUnitsCompatible(canonical, existing.unit)) {
    throw new ValidationError(null, [
      `cannot remove ${qty} ${canonical ?? 'count'} of "${key}" recorded in ${existing.unit ?? 'count'}`,
    ])
  }
  const converted = convertQuantity(qty, canonical, existing.unit) ?? qty
  if (isAtLeast(converted, existing.qty)) return withItems(inventory, others)

  return withItems(inventory, [
    ...others,
    { ...existing, qty: roundQuantity(existing.qty - converted) },
  ])
}

export function addTool(inventory: InventoryProfile, tool: string): InventoryProfile {
  return { ...inventory, tools: addToSet(inventory.tools, normalizeToolName(tool)) }
}

export function removeTool(inventory: InventoryProfile, tool: string): InventoryProfile {
  const key = normalizeToolName(tool)
  return { ...inventory, tools: inventory.tools.filter((t) => t !== key) }
}

export function addExclusion(inventory: InventoryProfile, ingredient: string): InventoryProfile {
  return {
    ...inventory,
    exclusions: addToSet(inventory.exclusions, normalizeIngredientName(ingredient)),
  }
}

export function removeExclusion(inventory: InventoryProfile, ingredient: string): InventoryProfile {
  const key = normalizeIngredientName(ingredient)
  return { ...inventory, exclusions: inventory.exclusions.filter((e) => e !== key) }
}

// Web-layer payloads: either string arrays or a single comma-separated string.
const nameList = z
  .union([z.string(), z.array(z.string())])
  .default([])
  .transform((value) => (typeof value === 'string' ? splitEntryList(value) : value))

const ingredientEntry = z.union([
  z.string(),
  z.object({
    name: z.string().min(1),
    qty: z.number().positive().nullish(),
    unit: z.string().nullish(),
  }),
])

export const InventoryInputSchema = z.object({
  ingredients: z
    .union([z.string(), z.array(ingredientEntry)])
    .default([])
    .transform((value) => (typeof value === 'string' ? splitEntryList(value) : value)),
  tools: nameList,
  exclusions: nameList,
})

export type InventoryInput = z.input<typeof InventoryInputSchema>

/**
 * Build a profile from a serialized payload. All names are normalized here,
 * not by the caller. Throws ValidationError on malformed input.
 */
export function parseInventory(raw: unknown): InventoryProfile {
  const parsed = InventoryInputSchema.safeParse(raw)
  if (!parsed.success) throw new ValidationError(null, formatZodIssues(parsed.error))

  let inventory = createInventory()
  for (const entry of parsed.data.ingredients) {
    if (typeof entry === 'string') {
      const item = parseInventoryEntry(entry)
      if (item) inventory = addIngredient(inventory, item.name, item.qty, item.unit)
    } else {
      inventory = addIngredient(inventory, entry.name, entry.qty ?? null, entry.unit ?? null)
    }
  }
  for (const tool of parsed.data.tools) inventory = addTool(inventory, tool)
  for (const exclusion of parsed.data.exclusions) inventory = addExclusion(inventory, exclusion)
  return inventory
}
