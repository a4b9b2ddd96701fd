import type { InventoryProfile } from '@domain/models/Inventory.ts'
import { createInventory } from '@application/inventory/inventoryProfile.ts'
import { db } from './database.ts'

export async function getInventory(ownerId: string): Promise<InventoryProfile> {
  const row = await db.inventories.get(ownerId)
  return row?.profile ?? createInventory()
}

export async function saveInventory(ownerId: string, profile: InventoryProfile): Promise<void> {
  await db.inventories.put({ ownerId, profile, updatedAt: new Date().toISOString() })
}

/**
 * Read-modify-write inside one transaction, so concurrent edits for the
 * same owner apply one after another. A throwing `mutate` writes nothing.
 */
export async function updateInventory(
  ownerId: string,
  mutate: (profile: InventoryProfile) => InventoryProfile,
): Promise<InventoryProfile> {
  return db.transaction('rw', db.inventories, async () => {
    const row = await db.inventories.get(ownerId)
    const next = mutate(row?.profile ?? createInventory())
    await db.inventories.put({ ownerId, profile: next, updatedAt: new Date().toISOString() })
    return next
  })
}

export async function deleteInventory(ownerId: string): Promise<void> {
  await db.inventories.delete(ownerId)
}
