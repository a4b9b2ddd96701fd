import Dexie, { type Table } from 'dexie'
import type { InventoryProfile } from '@domain/models/Inventory.ts'
import type { ShoppingList } from '@domain/models/ShoppingList.ts'
import { loadConfig } from '../../config.ts'

export interface StoredInventory {
  ownerId: string
  profile: InventoryProfile
  updatedAt: string
}

export interface StoredShoppingList {
  ownerId: string
  list: ShoppingList
  updatedAt: string
}

/** Per-owner snapshots. One row per owner in each table. */
export class LarderDB extends Dexie {
  inventories!: Table<StoredInventory, string>
  shoppingLists!: Table<StoredShoppingList, string>

  constructor(name: string = loadConfig().dbName) {
    super(name)

    this.version(1).stores({
      inventories: 'ownerId, updatedAt',
      shoppingLists: 'ownerId, updatedAt',
    })
  }
}

export const db = new LarderDB()
