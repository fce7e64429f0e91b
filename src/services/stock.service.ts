import { getStockPolicy, type StockPolicy } from '../config/stockPolicy';
import { getStorageConfig } from '../config/storage';
import {
  assertValidQuantity,
  classify,
  listAlerts,
  MovementLedger,
  predictShortageDetailed,
  resolveLookbackDays,
  statusColor,
  StockError,
  type AlertFilters,
  type ApplyMovementInput,
  type ItemFilter,
  type ItemRecord,
  type MovementRecord,
  type NewItem,
  type ShortagePrediction,
  type StockAlert,
  type StockStatus,
  type StockStore
} from '../domains/stock';
import { newItemSchema } from '../schemas/items.schema';
import { createStockStore } from '../storage';

export type ItemView = ItemRecord & {
  status: StockStatus;
  statusColor: ReturnType<typeof statusColor>;
};

export type AppliedMovement = {
  movement: MovementRecord;
  item: ItemView;
  previousQuantity: number;
  previousStatus: StockStatus;
  statusChanged: boolean;
};

export type CreateItemInput = NewItem & {
  openingQuantity?: number;
};

export const OPENING_BALANCE_NOTE = 'Opening balance';

/**
 * Process-facing entry point over one store and its ledger. Derived values (status,
 * predictions, alerts) are computed per call from the current store state.
 */
export class StockService {
  readonly ledger: MovementLedger;

  constructor(
    readonly store: StockStore,
    readonly policy: StockPolicy,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.ledger = new MovementLedger(store, { clock, overdrawPolicy: policy.overdrawPolicy });
  }

  classify(item: ItemRecord): StockStatus {
    return classify(item.currentQuantity, item.minQuantity, this.policy.warningMultiplier);
  }

  toItemView(item: ItemRecord): ItemView {
    const status = this.classify(item);
    return { ...item, status, statusColor: statusColor(status) };
  }

  async getItem(itemId: number): Promise<ItemRecord> {
    const item = await this.store.getItem(itemId);
    if (!item) {
      throw new StockError('ITEM_NOT_FOUND', { itemId });
    }
    return item;
  }

  async listItems(filter: ItemFilter = {}): Promise<ItemView[]> {
    const items = await this.store.listItems(filter);
    return items.map((item) => this.toItemView(item));
  }

  /**
   * Validates every field before anything is written, so a rejected item leaves no trace.
   * A positive opening quantity is recorded as an ADJUST movement.
   */
  async createItem(input: CreateItemInput, actorId: string | null = null): Promise<ItemView> {
    const { openingQuantity, ...fields } = input;
    if (openingQuantity !== undefined) {
      assertValidQuantity('ADJUST', openingQuantity);
    }
    const parsed = newItemSchema.safeParse(fields);
    if (!parsed.success) {
      throw new StockError('INVALID_ITEM', { fields: parsed.error.flatten().fieldErrors });
    }
    const created = await this.store.createItem(parsed.data);
    if (openingQuantity === undefined || openingQuantity === 0) {
      return this.toItemView(created);
    }
    const applied = await this.ledger.applyDetailed({
      itemId: created.id,
      kind: 'ADJUST',
      quantity: openingQuantity,
      actorId,
      note: OPENING_BALANCE_NOTE
    });
    return this.toItemView(applied.item);
  }

  async applyMovement(input: ApplyMovementInput): Promise<AppliedMovement> {
    const committed = await this.ledger.applyDetailed(input);
    const previousStatus = classify(
      committed.previousQuantity,
      committed.item.minQuantity,
      this.policy.warningMultiplier
    );
    const item = this.toItemView(committed.item);
    return {
      movement: committed.movement,
      item,
      previousQuantity: committed.previousQuantity,
      previousStatus,
      statusChanged: previousStatus !== item.status
    };
  }

  async getStatus(itemId: number): Promise<StockStatus> {
    return this.classify(await this.getItem(itemId));
  }

  async history(itemId: number, since?: Date): Promise<MovementRecord[]> {
    return since ? this.ledger.listRecent(itemId, since) : this.ledger.history(itemId);
  }

  async listAlerts(filters: AlertFilters = {}): Promise<StockAlert[]> {
    return listAlerts(this.store, filters, this.policy.warningMultiplier);
  }

  async predictShortage(itemId: number, lookbackDays?: number): Promise<ShortagePrediction> {
    const item = await this.getItem(itemId);
    return predictShortageDetailed(this.ledger, item, {
      lookbackDays: resolveLookbackDays(lookbackDays, this.policy.defaultLookbackDays),
      now: this.clock()
    });
  }

  async predictAll(lookbackDays?: number): Promise<Array<ShortagePrediction & { item: ItemView }>> {
    const resolved = resolveLookbackDays(lookbackDays, this.policy.defaultLookbackDays);
    const now = this.clock();
    const items = await this.store.listItems();
    const predictions: Array<ShortagePrediction & { item: ItemView }> = [];
    for (const item of items) {
      const prediction = await predictShortageDetailed(this.ledger, item, { lookbackDays: resolved, now });
      predictions.push({ ...prediction, item: this.toItemView(item) });
    }
    return predictions;
  }
}

let service: StockService | null = null;

export async function initStockService(
  options: { store?: StockStore; policy?: StockPolicy } = {}
): Promise<StockService> {
  const store = options.store ?? createStockStore(getStorageConfig());
  await store.open();
  service = new StockService(store, options.policy ?? getStockPolicy());
  return service;
}

export function getStockService(): StockService {
  if (!service) {
    throw new Error('STOCK_SERVICE_NOT_INITIALIZED');
  }
  return service;
}

export async function shutdownStockService(): Promise<void> {
  if (!service) return;
  const current = service;
  service = null;
  await current.store.close();
}
