import type { InventoryItem } from '@domain/models/Inventory.ts'
import { normalizeIngredientName } from '@application/inventory/normalizeName.ts'
import { parseQuantity } from './parseQuantity.ts'
import { parseUnit } from './parseUnit.ts'

/** Drop "(...)" notes such as "flour (about 2 cups, sifted)". */
function stripParentheticals(text: string): string {
  return text.replace(/\([^)]*\)/g, ' ').replace(/\s{2,}/g, ' ').trim()
}

/**
 * Parse a free-text pantry line into an inventory item.
 *
 *   "2 cups milk"   -> { name: 'milk', qty: 2, unit: 'cup' }
 *   "1½ kg flour"   -> { name: 'flour', qty: 1.5, unit: 'kilogram' }
 *   "3 eggs"        -> { name: 'egg', qty: 3, unit: null }
 *   "olive oil"     -> { name: 'olive oil', qty: null, unit: null }
 *
 * Units are only read after a quantity. Returns null when nothing
 * nameable is left.
 */
export function parseInventoryEntry(raw: string): InventoryItem | null {
  const text = stripParentheticals(raw.replace(/\s+/g, ' '))
  const { qty, remainder: afterQty } = parseQuantity(text)

  let unit: string | null = null
  let rest = afterQty
  if (qty !== null) {
    const parsed = parseUnit(afterQty)
    unit = parsed.unit
    rest = parsed.remainder
  }

  const name = normalizeIngredientName(rest.replace(/^of\s+/i, ''))
  if (!name) return null

  if (qty === null || qty <= 0) return { name, qty: null, unit: null }
  return { name, qty, unit }
}
