export { db, LarderDB } from './database.ts'
export {
  getInventory,
  saveInventory,
  updateInventory,
  deleteInventory,
} from './inventoryRepository.ts'
export {
  getShoppingList,
  saveShoppingList,
  updateShoppingList,
  deleteShoppingList,
} from './shoppingListRepository.ts'
