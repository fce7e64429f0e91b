import type { Stats } from 'node:fs';
import { access, mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { lock, type LockOptions } from 'proper-lockfile';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { toNumber } from '../lib/numbers';
import { storageUnavailable } from '../domains/stock/errors';
import type { StockStorageKind } from '../domains/stock/store';
import {
  kindFromMovementType,
  MOVEMENT_TYPE_BY_KIND,
  type ItemRecord,
  type MovementRecord
} from '../domains/stock/types';
import { InMemoryStockStore, type StockSnapshot } from './inMemoryStockStore';

const numeric = z.union([z.number(), z.string()]).transform((value) => toNumber(value));
const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined || value === '' ? null : String(value)));

const fileItemSchema = z.object({
  id: z.coerce.number().int().positive(),
  name: z.string(),
  sku: z.string(),
  category: z.string().optional(),
  unit: z.string(),
  current_quantity: numeric,
  min_quantity: numeric,
  supplier: optionalText,
  warehouse: optionalText
});

const fileMovementSchema = z.object({
  id: z.coerce.number().int().positive(),
  item_id: z.coerce.number().int().positive(),
  quantity: numeric,
  movement_type: z.enum(['in', 'out', 'adjustment']),
  notes: optionalText,
  user_id: optionalText,
  timestamp: z.string()
});

const fileDocumentSchema = z.object({
  inventory_items: z.array(fileItemSchema).default([]),
  stock_movements: z.array(fileMovementSchema).default([])
});

export type StockFileDocument = z.input<typeof fileDocumentSchema>;

// a crashed writer's lock is taken over after `stale` ms
const DEFAULT_LOCK_OPTIONS: LockOptions = {
  stale: 10_000,
  retries: { retries: 20, factor: 1.5, minTimeout: 20, maxTimeout: 500 }
};

const ZONE_SUFFIX = /([zZ]|[+-]\d{2}:?\d{2})$/;

/** Timestamps written without a zone designator are UTC. */
export function parseFileTimestamp(value: string): Date {
  const date = new Date(ZONE_SUFFIX.test(value) ? value : `${value}Z`);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Invalid movement timestamp: ${value}`);
  }
  return date;
}

export function parseStockFile(raw: unknown): StockSnapshot {
  const document = fileDocumentSchema.parse(raw);
  const items: ItemRecord[] = document.inventory_items.map((row) => ({
    id: row.id,
    name: row.name,
    sku: row.sku,
    category: row.category ?? 'raw_material',
    unit: row.unit,
    currentQuantity: row.current_quantity,
    minQuantity: row.min_quantity,
    supplierRef: row.supplier,
    warehouseRef: row.warehouse
  }));
  const movements: MovementRecord[] = document.stock_movements.map((row) => ({
    id: row.id,
    itemId: row.item_id,
    kind: kindFromMovementType(row.movement_type) ?? 'ADJUST',
    quantity: row.quantity,
    actorId: row.user_id,
    note: row.notes,
    timestamp: parseFileTimestamp(row.timestamp)
  }));
  return { items, movements };
}

export function toStockFile(snapshot: StockSnapshot): StockFileDocument {
  return {
    inventory_items: snapshot.items.map((item) => ({
      id: item.id,
      name: item.name,
      sku: item.sku,
      category: item.category,
      current_quantity: item.currentQuantity,
      min_quantity: item.minQuantity,
      unit: item.unit,
      supplier: item.supplierRef,
      warehouse: item.warehouseRef
    })),
    stock_movements: snapshot.movements.map((movement) => ({
      id: movement.id,
      item_id: movement.itemId,
      quantity: movement.quantity,
      movement_type: MOVEMENT_TYPE_BY_KIND[movement.kind],
      notes: movement.note,
      user_id: movement.actorId,
      timestamp: movement.timestamp.toISOString()
    }))
  };
}

function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

function versionOf(stats: Stats): string {
  return `${stats.ino}:${stats.size}:${stats.mtimeMs}`;
}

const EMPTY_DOCUMENT = `${JSON.stringify(toStockFile({ items: [], movements: [] }), null, 2)}\n`;

/**
 * Single JSON document holding every item and movement, shared by every process that points
 * at the same path. Each write takes an exclusive lock on the file, reloads the document,
 * applies the change and replaces the file through a temporary file and a rename. Reads
 * reload the document whenever the file changed since it was last loaded.
 */
export class JsonFileStockStore extends InMemoryStockStore {
  readonly kind: StockStorageKind = 'file';
  private loadedVersion: string | null = null;

  constructor(
    private readonly filePath: string,
    private readonly lockOptions: LockOptions = DEFAULT_LOCK_OPTIONS
  ) {
    super();
    this.opened = false;
  }

  async open(): Promise<void> {
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      try {
        await writeFile(this.filePath, EMPTY_DOCUMENT, { encoding: 'utf8', flag: 'wx' });
      } catch (error) {
        if (!hasErrorCode(error, 'EEXIST')) throw error;
      }
      await this.reload();
      this.opened = true;
    } catch (error) {
      throw storageUnavailable(error, { store: this.kind, file: this.filePath });
    }
  }

  async close(): Promise<void> {
    await super.close();
    this.loadedVersion = null;
  }

  async ping(): Promise<void> {
    this.ensureOpen();
    try {
      await access(this.filePath);
    } catch (error) {
      throw storageUnavailable(error, { store: this.kind, file: this.filePath });
    }
  }

  protected async refresh(): Promise<void> {
    try {
      const stats = await stat(this.filePath);
      if (versionOf(stats) !== this.loadedVersion) {
        await this.reload();
      }
    } catch (error) {
      throw storageUnavailable(error, { store: this.kind, file: this.filePath });
    }
  }

  protected async exclusive<T>(task: () => Promise<T>): Promise<T> {
    this.ensureOpen();
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      await release();
    }
  }

  protected async persist(snapshot: StockSnapshot): Promise<void> {
    const tempPath = `${this.filePath}.${uuidv4()}.tmp`;
    try {
      await writeFile(tempPath, `${JSON.stringify(toStockFile(snapshot), null, 2)}\n`, 'utf8');
      await rename(tempPath, this.filePath);
      this.loadedVersion = versionOf(await stat(this.filePath));
    } catch (error) {
      await rm(tempPath, { force: true });
      throw storageUnavailable(error, { store: this.kind, file: this.filePath });
    }
  }

  private async acquire(): Promise<() => Promise<void>> {
    try {
      const release = await lock(this.filePath, this.lockOptions);
      try {
        await this.reload();
      } catch (error) {
        await release();
        throw error;
      }
      return release;
    } catch (error) {
      throw storageUnavailable(error, { store: this.kind, file: this.filePath });
    }
  }

  // stat before reading: a write landing in between only causes one extra reload later
  private async reload(): Promise<void> {
    const stats = await stat(this.filePath);
    const raw = await readFile(this.filePath, 'utf8');
    this.load(parseStockFile(JSON.parse(raw)));
    this.loadedVersion = versionOf(stats);
  }
}
