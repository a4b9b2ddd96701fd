export type { UnitFamily } from '@domain/constants/units.ts'
export type { RecipeIngredient } from '@domain/models/Ingredient.ts'
export type { InventoryItem, InventoryProfile } from '@domain/models/Inventory.ts'
export type { Recipe, SubstitutionHint } from '@domain/models/Recipe.ts'
export type {
  Alternative,
  SubstitutionContext,
  SubstitutionRule,
  SubstitutionTable,
} from '@domain/models/Substitution.ts'
export type { RecipeCatalog } from '@domain/models/Catalog.ts'
export type {
  IngredientReadiness,
  ReadinessReport,
  ReadinessStatus,
  Resolution,
  ToolCompatibility,
  ToolReadiness,
  UnitIncompatibilityWarning,
} from '@domain/models/ReadinessReport.ts'
export type { RecipeContribution, ShoppingList, ShoppingListEntry } from '@domain/models/ShoppingList.ts'
export { ConfigError, LarderError, NotFoundError, ValidationError } from '@domain/errors.ts'

export {
  addExclusion,
  addIngredient,
  addTool,
  createInventory,
  findIngredient,
  hasTool,
  isExcluded,
  parseInventory,
  removeExclusion,
  removeIngredient,
  removeTool,
  type InventoryInput,
} from '@application/inventory/inventoryProfile.ts'
export { normalizeIngredientName, normalizeToolName, splitEntryList } from '@application/inventory/normalizeName.ts'
export { parseInventoryEntry } from '@application/parser/parseInventoryEntry.ts'
export { convertQuantity, areUnitsCompatible } from '@application/units/convertQuantity.ts'
export { ingestRecipe, ingestSubstitutionRule } from '@application/catalog/ingestRecipe.ts'
export type { RecipeInput, SubstitutionRuleInput } from '@application/catalog/recipeSchema.ts'
export {
  buildCatalog,
  getRecipe,
  indexRules,
  listRecipes,
  type CatalogBuildResult,
  type CatalogSource,
} from '@application/catalog/buildCatalog.ts'
export { resolveSubstitutions, hintScore } from '@application/substitution/resolveSubstitutions.ts'
export { adaptRecipe, applySubstitution } from '@application/substitution/applySubstitution.ts'
export { DEFAULT_MATCH_OPTIONS, type MatchOptions } from '@application/matching/matchOptions.ts'
export { evaluateRecipe } from '@application/matching/evaluateRecipe.ts'
export {
  matchRecipe,
  rankRecipes,
  recommendRecipes,
  requiresExcluded,
  type Recommendation,
  type RecommendRequest,
} from '@application/matching/rankRecipes.ts'
export {
  addFromRecipe,
  addManual,
  clearCompleted,
  createShoppingList,
  entryKey,
  findEntry,
  removeManual,
  removeRecipeContribution,
  toggleCompleted,
} from '@application/shopping/shoppingList.ts'
export { formatShoppingEntry, formatShoppingList } from '@application/shopping/formatShoppingList.ts'

export { loadConfig, toMatchOptions, type LarderConfig } from './config.ts'
export { loadCatalogFromDirectory, loadDefaultCatalog } from '@infrastructure/catalog/loadCatalog.ts'
