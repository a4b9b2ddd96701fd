export interface RecipeContribution {
  recipeId: string
  qty: number | null          // null = unmeasured requirement
  reopened: boolean           // this contribution un-completed the entry
}

export interface ShoppingListEntry {
  key: string                 // `${ingredient}|${unitKey}`
  ingredient: string
  unit: string | null         // quantities below are in this unit
  quantityNeeded: number | null
  sourceRecipeIds: string[]   // provenance, sorted
  contributions: RecipeContribution[]
  manual: boolean
  manualQty: number | null
  completed: boolean
}

export interface ShoppingList {
  id: string
  entries: ShoppingListEntry[]
}
