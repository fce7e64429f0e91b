import { closePool, query, withTransaction } from '../db';
import { PG_UNIQUE_VIOLATION, isPgError } from '../lib/pgErrors';
import { toNumber } from '../lib/numbers';
import { StockError, storageUnavailable } from '../domains/stock/errors';
import type {
  CommittedMovement,
  ItemFilter,
  MovementPlan,
  NewItem,
  StockStorageKind,
  StockStore
} from '../domains/stock/store';
import {
  kindFromMovementType,
  MOVEMENT_TYPE_BY_KIND,
  type ItemRecord,
  type MovementRecord
} from '../domains/stock/types';

export type StockItemRow = {
  id: number | string;
  name: string;
  sku: string;
  category: string;
  unit: string;
  current_quantity: number | string;
  min_quantity: number | string;
  supplier_ref: string | null;
  warehouse_ref: string | null;
};

export type StockMovementRow = {
  id: number | string;
  item_id: number | string;
  movement_type: string;
  quantity: number | string;
  actor_id: string | null;
  notes: string | null;
  occurred_at: Date | string;
};

// Held for the append step only, so ids and timestamps are handed out in one order.
const LEDGER_APPEND_LOCK_KEY = 728_301;

export function mapItemRow(row: StockItemRow): ItemRecord {
  return {
    id: toNumber(row.id),
    name: row.name,
    sku: row.sku,
    category: row.category,
    unit: row.unit,
    currentQuantity: toNumber(row.current_quantity),
    minQuantity: toNumber(row.min_quantity),
    supplierRef: row.supplier_ref,
    warehouseRef: row.warehouse_ref
  };
}

export function mapMovementRow(row: StockMovementRow): MovementRecord {
  const kind = kindFromMovementType(row.movement_type);
  if (!kind) {
    throw new StockError('STORAGE_UNAVAILABLE', {
      reason: 'unknown movement_type',
      movementType: row.movement_type,
      movementId: String(row.id)
    });
  }
  return {
    id: toNumber(row.id),
    itemId: toNumber(row.item_id),
    kind,
    quantity: toNumber(row.quantity),
    actorId: row.actor_id,
    note: row.notes,
    timestamp: row.occurred_at instanceof Date ? row.occurred_at : new Date(row.occurred_at)
  };
}

export class PostgresStockStore implements StockStore {
  readonly kind: StockStorageKind = 'postgres';

  async open(): Promise<void> {
    await this.ping();
  }

  async close(): Promise<void> {
    await closePool();
  }

  async ping(): Promise<void> {
    await this.run(() => query('SELECT 1'));
  }

  async getItem(itemId: number): Promise<ItemRecord | null> {
    const res = await this.run(() => query<StockItemRow>('SELECT * FROM stock_items WHERE id = $1', [itemId]));
    if (res.rowCount === 0) return null;
    return mapItemRow(res.rows[0]);
  }

  async listItems(filter: ItemFilter = {}): Promise<ItemRecord[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.supplierRef !== undefined) {
      params.push(filter.supplierRef);
      conditions.push(`supplier_ref = $${params.length}`);
    }
    if (filter.warehouseRef !== undefined) {
      params.push(filter.warehouseRef);
      conditions.push(`warehouse_ref = $${params.length}`);
    }
    if (filter.category !== undefined) {
      params.push(filter.category);
      conditions.push(`category = $${params.length}`);
    }
    if (filter.search) {
      params.push(`%${filter.search}%`);
      conditions.push(`(name ILIKE $${params.length} OR sku ILIKE $${params.length})`);
    }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const res = await this.run(() =>
      query<StockItemRow>(`SELECT * FROM stock_items ${where} ORDER BY id ASC`, params)
    );
    return res.rows.map(mapItemRow);
  }

  async createItem(input: NewItem): Promise<ItemRecord> {
    try {
      const res = await query<StockItemRow>(
        `INSERT INTO stock_items (
            name, sku, category, unit, current_quantity, min_quantity, supplier_ref, warehouse_ref, created_at, updated_at
         ) VALUES ($1, $2, $3, $4, 0, $5, $6, $7, now(), now())
         RETURNING *`,
        [input.name, input.sku, input.category, input.unit, input.minQuantity, input.supplierRef, input.warehouseRef]
      );
      return mapItemRow(res.rows[0]);
    } catch (err) {
      if (isPgError(err, PG_UNIQUE_VIOLATION, 'uq_stock_items_sku')) {
        throw new StockError('SKU_CONFLICT', { sku: input.sku });
      }
      throw storageUnavailable(err, { store: this.kind });
    }
  }

  async listMovements(itemId: number, since?: Date): Promise<MovementRecord[]> {
    const params: unknown[] = [itemId];
    let sinceClause = '';
    if (since) {
      params.push(since);
      sinceClause = 'AND occurred_at >= $2';
    }
    const res = await this.run(() =>
      query<StockMovementRow>(
        `SELECT * FROM stock_movements
          WHERE item_id = $1 ${sinceClause}
          ORDER BY id ASC`,
        params
      )
    );
    return res.rows.map(mapMovementRow);
  }

  async commitMovement(
    itemId: number,
    plan: (item: ItemRecord) => MovementPlan
  ): Promise<CommittedMovement | null> {
    return this.run(() =>
      withTransaction(async (client) => {
        const locked = await client.query<StockItemRow>('SELECT * FROM stock_items WHERE id = $1 FOR UPDATE', [
          itemId
        ]);
        if (locked.rowCount === 0) return null;
        const item = mapItemRow(locked.rows[0]);
        const planned = plan(item);

        await client.query('SELECT pg_advisory_xact_lock($1)', [LEDGER_APPEND_LOCK_KEY]);
        const inserted = await client.query<StockMovementRow>(
          `INSERT INTO stock_movements (item_id, movement_type, quantity, actor_id, notes, occurred_at)
           VALUES (
             $1, $2, $3, $4, $5,
             GREATEST($6::timestamptz, COALESCE((SELECT MAX(occurred_at) FROM stock_movements), $6::timestamptz))
           )
           RETURNING *`,
          [
            itemId,
            MOVEMENT_TYPE_BY_KIND[planned.kind],
            planned.quantity,
            planned.actorId,
            planned.note,
            planned.requestedAt
          ]
        );
        const updated = await client.query<StockItemRow>(
          `UPDATE stock_items
              SET current_quantity = $1,
                  updated_at = now()
            WHERE id = $2
            RETURNING *`,
          [planned.nextQuantity, itemId]
        );

        return {
          movement: mapMovementRow(inserted.rows[0]),
          item: mapItemRow(updated.rows[0]),
          previousQuantity: item.currentQuantity
        };
      })
    );
  }

  /** Runs a storage call, turning anything that is not already a StockError into STORAGE_UNAVAILABLE. */
  private async run<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (err) {
      throw storageUnavailable(err, { store: this.kind });
    }
  }
}
