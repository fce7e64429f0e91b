import { afterEach, describe, expect, it } from 'vitest';
import { InMemoryStockStore } from '../storage/inMemoryStockStore';
import {
  getStockService,
  initStockService,
  OPENING_BALANCE_NOTE,
  shutdownStockService,
  StockService,
  type CreateItemInput
} from './stock.service';

const DAY_MS = 24 * 60 * 60 * 1000;
const NOW = new Date('2026-05-01T00:00:00.000Z');

const steel: CreateItemInput = {
  name: 'Steel Sheets',
  sku: 'STL-001',
  category: 'raw_material',
  unit: 'pc',
  minQuantity: 50,
  supplierRef: 'SUP-STEEL',
  warehouseRef: 'WH-MAIN',
  openingQuantity: 150
};

const pellets: CreateItemInput = {
  name: 'Plastic Pellets',
  sku: 'PLA-001',
  category: 'raw_material',
  unit: 'kg',
  minQuantity: 200,
  supplierRef: 'SUP-POLY',
  warehouseRef: 'WH-MAIN',
  openingQuantity: 250
};

function createService(overdrawPolicy: 'clamp' | 'reject' = 'clamp') {
  const store = new InMemoryStockStore();
  const service = new StockService(
    store,
    { warningMultiplier: 1.5, defaultLookbackDays: 30, overdrawPolicy },
    () => NOW
  );
  return { store, service };
}

describe('StockService', () => {
  it('records the opening quantity as an ADJUST movement', async () => {
    const { service } = createService();
    const item = await service.createItem(steel, 'user-1');

    expect(item.currentQuantity).toBe(150);
    expect(item.status).toBe('NORMAL');
    expect(item.statusColor).toBe('green');
    const [opening] = await service.history(item.id);
    expect(opening).toMatchObject({ kind: 'ADJUST', quantity: 150, actorId: 'user-1', note: OPENING_BALANCE_NOTE });
  });

  it('creates items without an opening movement when none is given', async () => {
    const { service } = createService();
    const item = await service.createItem({ ...steel, openingQuantity: undefined });

    expect(item.currentQuantity).toBe(0);
    expect(item.status).toBe('CRITICAL');
    expect(await service.history(item.id)).toEqual([]);
  });

  it('reports status transitions on applied movements', async () => {
    const { service } = createService();
    const item = await service.createItem(steel);

    const first = await service.applyMovement({ itemId: item.id, kind: 'OUT', quantity: 120 });
    expect(first.previousQuantity).toBe(150);
    expect(first.previousStatus).toBe('NORMAL');
    expect(first.item.status).toBe('WARNING');
    expect(first.statusChanged).toBe(true);

    const second = await service.applyMovement({ itemId: item.id, kind: 'IN', quantity: 5 });
    expect(second.item.currentQuantity).toBe(35);
    expect(second.statusChanged).toBe(false);
  });

  it('refuses over-withdrawal when the policy rejects it', async () => {
    const { service } = createService('reject');
    const item = await service.createItem(steel);

    await expect(service.applyMovement({ itemId: item.id, kind: 'OUT', quantity: 151 })).rejects.toMatchObject({
      code: 'INSUFFICIENT_STOCK'
    });
    expect((await service.getItem(item.id)).currentQuantity).toBe(150);
  });

  it('raises ITEM_NOT_FOUND for unknown items', async () => {
    const { service } = createService();
    await expect(service.getStatus(42)).rejects.toMatchObject({ code: 'ITEM_NOT_FOUND' });
    await expect(service.predictShortage(42)).rejects.toMatchObject({ code: 'ITEM_NOT_FOUND' });
  });

  it('filters history by time', async () => {
    const { service } = createService();
    const item = await service.createItem(steel);
    await service.applyMovement({ itemId: item.id, kind: 'OUT', quantity: 10 });

    expect(await service.history(item.id, new Date(NOW.getTime() + 1))).toEqual([]);
    expect(await service.history(item.id, NOW)).toHaveLength(2);
  });

  it('lists alerts with the policy multiplier', async () => {
    const { service } = createService();
    await service.createItem(steel);
    const low = await service.createItem(pellets);

    const alerts = await service.listAlerts();
    expect(alerts.map((alert) => [alert.item.sku, alert.status])).toEqual([['PLA-001', 'WARNING']]);
    expect(alerts[0].item.id).toBe(low.id);
  });

  it('predicts every item with one lookback', async () => {
    const { service } = createService();
    const a = await service.createItem(steel);
    await service.createItem(pellets);
    await service.applyMovement({ itemId: a.id, kind: 'OUT', quantity: 30 });

    const predictions = await service.predictAll(10);
    expect(predictions.map((prediction) => prediction.item.sku)).toEqual(['STL-001', 'PLA-001']);
    expect(predictions[0].avgDailyUsage).toBe(3);
    expect(predictions[0].shortageDate).toEqual(new Date(NOW.getTime() + 40 * DAY_MS));
    expect(predictions[1].reliable).toBe(false);
    expect(predictions.every((prediction) => prediction.lookbackDays === 10)).toBe(true);
  });

  it('falls back to the policy lookback', async () => {
    const { service } = createService();
    const item = await service.createItem(steel);
    expect((await service.predictShortage(item.id, 0)).lookbackDays).toBe(30);
  });

  it.each([Number.POSITIVE_INFINITY, Number.NaN, -5])(
    'rejects opening quantity %s without creating the item',
    async (openingQuantity) => {
      const { service } = createService();
      await expect(service.createItem({ ...steel, openingQuantity })).rejects.toMatchObject({
        code: 'INVALID_QUANTITY'
      });
      expect(await service.listItems()).toEqual([]);
    }
  );

  it.each([
    ['unit', { unit: 'crate' }],
    ['category', { category: 'scrap' }],
    ['minQuantity', { minQuantity: -1 }],
    ['minQuantity', { minQuantity: Number.POSITIVE_INFINITY }],
    ['name', { name: '   ' }]
  ])('rejects an invalid %s without creating the item', async (field, patch) => {
    const { service } = createService();
    const failure = await service.createItem({ ...steel, ...patch }).catch((error: unknown) => error);

    expect(failure).toMatchObject({ code: 'INVALID_ITEM' });
    expect(failure).toHaveProperty(['details', 'fields', field]);
    expect(await service.listItems()).toEqual([]);
  });

  it('trims names and blank references before storing', async () => {
    const { service } = createService();
    const item = await service.createItem({
      ...steel,
      name: '  Steel Sheets  ',
      supplierRef: '  ',
      warehouseRef: ' WH-MAIN '
    });

    expect(item).toMatchObject({ name: 'Steel Sheets', supplierRef: null, warehouseRef: 'WH-MAIN' });
  });
});

describe('stock service lifecycle', () => {
  afterEach(async () => {
    await shutdownStockService();
  });

  it('opens the store on init and closes it on shutdown', async () => {
    const store = new InMemoryStockStore();
    await store.close();

    const service = await initStockService({ store });
    expect(getStockService()).toBe(service);
    await expect(service.listItems()).resolves.toEqual([]);

    await shutdownStockService();
    expect(() => getStockService()).toThrow('STOCK_SERVICE_NOT_INITIALIZED');
    await expect(store.listItems()).rejects.toMatchObject({ code: 'STORAGE_UNAVAILABLE' });
  });
});
