export interface InventoryItem {
  name: string                // canonical ingredient name
  qty: number | null          // null = "some amount available"
  unit: string | null
}

/** A user's kitchen. Arrays are kept sorted by name. */
export interface InventoryProfile {
  ingredients: InventoryItem[]
  tools: string[]
  exclusions: string[]
}
