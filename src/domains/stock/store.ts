import type { ItemRecord, MovementKind, MovementRecord } from './types';

export type StockStorageKind = 'postgres' | 'file' | 'memory';

export type ItemFilter = {
  supplierRef?: string;
  warehouseRef?: string;
  category?: string;
  search?: string;
};

export type NewItem = {
  name: string;
  sku: string;
  category: string;
  unit: string;
  minQuantity: number;
  supplierRef: string | null;
  warehouseRef: string | null;
};

/** What the ledger wants written, decided against the locked item. */
export type MovementPlan = {
  kind: MovementKind;
  quantity: number;
  actorId: string | null;
  note: string | null;
  nextQuantity: number;
  requestedAt: Date;
};

export type CommittedMovement = {
  movement: MovementRecord;
  item: ItemRecord;
  previousQuantity: number;
};

export type ItemCatalog = {
  getItem(itemId: number): Promise<ItemRecord | null>;
  listItems(filter?: ItemFilter): Promise<ItemRecord[]>;
};

/**
 * Storage collaborator behind the ledger.
 *
 * `commitMovement` is the only write path for quantities: the store reads the item under
 * its own lock, calls `plan` with that snapshot, then appends the movement and stores
 * `nextQuantity` as one durable unit. The store assigns the movement id and stamps it with
 * `max(plan.requestedAt, latest ledger timestamp)`. A `plan` that throws aborts the commit
 * with nothing written. Resolves `null` when the item does not exist.
 */
export interface StockStore extends ItemCatalog {
  readonly kind: StockStorageKind;
  open(): Promise<void>;
  close(): Promise<void>;
  ping(): Promise<void>;
  createItem(input: NewItem): Promise<ItemRecord>;
  listMovements(itemId: number, since?: Date): Promise<MovementRecord[]>;
  commitMovement(itemId: number, plan: (item: ItemRecord) => MovementPlan): Promise<CommittedMovement | null>;
}
