import type { ShoppingList, ShoppingListEntry } from '@domain/models/ShoppingList.ts'
import { pluralUnit } from '@domain/constants/units.ts'
import { formatQuantity } from './formatQuantity.ts'

/**
 * One entry as text: "2 cups milk (pancakes, waffles)". Unmeasured needs
 * print the name alone; hand-added entries list "manual" as a source.
 */
export function formatShoppingEntry(entry: ShoppingListEntry): string {
  const parts: string[] = []
  const qty = entry.quantityNeeded

  if (qty !== null) {
    parts.push(formatQuantity(qty))
    if (entry.unit !== null) parts.push(qty > 1 ? pluralUnit(entry.unit) : entry.unit)
  }
  parts.push(entry.ingredient)

  const sources = entry.manual ? [...entry.sourceRecipeIds, 'manual'] : entry.sourceRecipeIds
  if (sources.length > 0) parts.push(`(${sources.join(', ')})`)

  return parts.join(' ')
}

/** Plain-text checklist, outstanding entries first. */
export function formatShoppingList(list: ShoppingList): string {
  const open = list.entries.filter((entry) => !entry.completed)
  const done = list.entries.filter((entry) => entry.completed)
  return [...open, ...done]
    .map((entry) => `${entry.completed ? '[x]' : '[ ]'} ${formatShoppingEntry(entry)}`)
    .join('\n')
}
