import { KeyedLock } from '../lib/keyedLock';
import { StockError } from '../domains/stock/errors';
import type {
  CommittedMovement,
  ItemFilter,
  MovementPlan,
  NewItem,
  StockStorageKind,
  StockStore
} from '../domains/stock/store';
import { cloneItem, cloneMovement, type ItemRecord, type MovementRecord } from '../domains/stock/types';

export type StockSnapshot = {
  items: ItemRecord[];
  movements: MovementRecord[];
};

export function matchesItemFilter(item: ItemRecord, filter: ItemFilter): boolean {
  if (filter.supplierRef !== undefined && item.supplierRef !== filter.supplierRef) return false;
  if (filter.warehouseRef !== undefined && item.warehouseRef !== filter.warehouseRef) return false;
  if (filter.category !== undefined && item.category !== filter.category) return false;
  if (filter.search) {
    const needle = filter.search.toLowerCase();
    if (!item.name.toLowerCase().includes(needle) && !item.sku.toLowerCase().includes(needle)) {
      return false;
    }
  }
  return true;
}

/**
 * Keeps the whole ledger in process memory. Writes build the next snapshot, hand it to
 * `persist`, and only then replace the visible state, so readers never observe a movement
 * without its quantity update.
 *
 * Subclasses backed by shared storage override `persist` to make commits durable, `refresh`
 * to pick up changes made by other processes before a read, and `exclusive` to hold a
 * cross-process lock (and reload) around each write.
 */
export class InMemoryStockStore implements StockStore {
  readonly kind: StockStorageKind = 'memory';

  protected items = new Map<number, ItemRecord>();
  protected movements: MovementRecord[] = [];
  protected opened = true;
  private lastItemId = 0;
  private readonly commitLock = new KeyedLock<'commit'>();

  constructor(seed?: Partial<StockSnapshot>) {
    if (seed) {
      this.load({ items: seed.items ?? [], movements: seed.movements ?? [] });
    }
  }

  async open(): Promise<void> {
    this.opened = true;
  }

  async close(): Promise<void> {
    this.opened = false;
  }

  async ping(): Promise<void> {
    this.ensureOpen();
  }

  async getItem(itemId: number): Promise<ItemRecord | null> {
    this.ensureOpen();
    await this.refresh();
    const item = this.items.get(itemId);
    return item ? cloneItem(item) : null;
  }

  async listItems(filter: ItemFilter = {}): Promise<ItemRecord[]> {
    this.ensureOpen();
    await this.refresh();
    return [...this.items.values()]
      .filter((item) => matchesItemFilter(item, filter))
      .sort((a, b) => a.id - b.id)
      .map(cloneItem);
  }

  async listMovements(itemId: number, since?: Date): Promise<MovementRecord[]> {
    this.ensureOpen();
    await this.refresh();
    return this.movements
      .filter((movement) => movement.itemId === itemId)
      .filter((movement) => !since || movement.timestamp.getTime() >= since.getTime())
      .map(cloneMovement);
  }

  async createItem(input: NewItem): Promise<ItemRecord> {
    return this.commitLock.run('commit', () => this.exclusive(async () => {
      this.ensureOpen();
      for (const existing of this.items.values()) {
        if (existing.sku === input.sku) {
          throw new StockError('SKU_CONFLICT', { sku: input.sku });
        }
      }

      const id = this.lastItemId + 1;
      const item: ItemRecord = { id, ...input, currentQuantity: 0 };
      const nextItems = new Map(this.items);
      nextItems.set(id, item);

      await this.persist({ items: [...nextItems.values()], movements: this.movements });
      this.items = nextItems;
      this.lastItemId = id;
      return cloneItem(item);
    }));
  }

  async commitMovement(
    itemId: number,
    plan: (item: ItemRecord) => MovementPlan
  ): Promise<CommittedMovement | null> {
    return this.commitLock.run('commit', () => this.exclusive(async () => {
      this.ensureOpen();
      const item = this.items.get(itemId);
      if (!item) return null;

      const planned = plan(cloneItem(item));
      const last = this.movements.at(-1);
      const timestamp =
        last && last.timestamp.getTime() > planned.requestedAt.getTime()
          ? new Date(last.timestamp.getTime())
          : new Date(planned.requestedAt.getTime());

      const movement: MovementRecord = {
        id: (last?.id ?? 0) + 1,
        itemId,
        kind: planned.kind,
        quantity: planned.quantity,
        actorId: planned.actorId,
        note: planned.note,
        timestamp
      };
      const updated: ItemRecord = { ...item, currentQuantity: planned.nextQuantity };

      const nextItems = new Map(this.items);
      nextItems.set(itemId, updated);
      const nextMovements = [...this.movements, movement];

      await this.persist({ items: [...nextItems.values()], movements: nextMovements });
      this.items = nextItems;
      this.movements = nextMovements;

      return {
        movement: cloneMovement(movement),
        item: cloneItem(updated),
        previousQuantity: item.currentQuantity
      };
    }));
  }

  snapshot(): StockSnapshot {
    return {
      items: [...this.items.values()].sort((a, b) => a.id - b.id).map(cloneItem),
      movements: this.movements.map(cloneMovement)
    };
  }

  protected load(snapshot: StockSnapshot): void {
    this.items = new Map(snapshot.items.map((item) => [item.id, cloneItem(item)]));
    this.movements = [...snapshot.movements]
      .sort((a, b) => a.id - b.id)
      .map(cloneMovement);
    this.lastItemId = snapshot.items.reduce((max, item) => Math.max(max, item.id), 0);
  }

  protected async persist(_snapshot: StockSnapshot): Promise<void> {
    // memory only
  }

  protected async refresh(): Promise<void> {
    // memory only
  }

  protected async exclusive<T>(task: () => Promise<T>): Promise<T> {
    return task();
  }

  protected ensureOpen(): void {
    if (!this.opened) {
      throw new StockError('STORAGE_UNAVAILABLE', { store: this.kind, reason: 'store is closed' });
    }
  }
}
