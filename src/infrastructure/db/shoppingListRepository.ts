import type { ShoppingList } from '@domain/models/ShoppingList.ts'
import { createShoppingList } from '@application/shopping/shoppingList.ts'
import { db } from './database.ts'

function listIdFor(ownerId: string): string {
  return `shopping-${ownerId}`
}

export async function getShoppingList(ownerId: string): Promise<ShoppingList> {
  const row = await db.shoppingLists.get(ownerId)
  return row?.list ?? createShoppingList(listIdFor(ownerId))
}

export async function saveShoppingList(ownerId: string, list: ShoppingList): Promise<void> {
  await db.shoppingLists.put({ ownerId, list, updatedAt: new Date().toISOString() })
}

/**
 * Apply one list mutation atomically. Concurrent edits to the same list are
 * serialized here; whichever commits last wins for the entries it touched.
 */
export async function updateShoppingList(
  ownerId: string,
  mutate: (list: ShoppingList) => ShoppingList,
): Promise<ShoppingList> {
  return db.transaction('rw', db.shoppingLists, async () => {
    const row = await db.shoppingLists.get(ownerId)
    const next = mutate(row?.list ?? createShoppingList(listIdFor(ownerId)))
    await db.shoppingLists.put({ ownerId, list: next, updatedAt: new Date().toISOString() })
    return next
  })
}

export async function deleteShoppingList(ownerId: string): Promise<void> {
  await db.shoppingLists.delete(ownerId)
}
