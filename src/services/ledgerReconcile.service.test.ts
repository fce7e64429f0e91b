import { describe, expect, it } from 'vitest';
import { InMemoryStockStore } from '../storage/inMemoryStockStore';
import { compareLedgerBalances, reconcileLedger } from './ledgerReconcile.service';

const at = (iso: string) => new Date(iso);

function seededStore() {
  return new InMemoryStockStore({
    items: [
      {
        id: 1,
        name: 'Steel Sheets',
        sku: 'STL-001',
        category: 'raw_material',
        unit: 'pc',
        currentQuantity: 30,
        minQuantity: 50,
        supplierRef: null,
        warehouseRef: null
      },
      {
        id: 2,
        name: 'Plastic Pellets',
        sku: 'PLA-001',
        category: 'raw_material',
        unit: 'kg',
        currentQuantity: 480,
        minQuantity: 200,
        supplierRef: null,
        warehouseRef: null
      },
      {
        id: 3,
        name: 'Cardboard Boxes',
        sku: 'PKG-010',
        category: 'packaging',
        unit: 'pc',
        currentQuantity: 12,
        minQuantity: 100,
        supplierRef: null,
        warehouseRef: null
      }
    ],
    movements: [
      { id: 1, itemId: 1, kind: 'ADJUST', quantity: 150, actorId: null, note: null, timestamp: at('2026-01-01T00:00:00Z') },
      { id: 2, itemId: 1, kind: 'OUT', quantity: 120, actorId: null, note: null, timestamp: at('2026-01-02T00:00:00Z') },
      { id: 3, itemId: 2, kind: 'IN', quantity: 500, actorId: null, note: null, timestamp: at('2026-01-03T00:00:00Z') }
    ]
  });
}

describe('compareLedgerBalances', () => {
  it('lists items whose stored quantity differs from their replayed history, largest first', async () => {
    const mismatches = await compareLedgerBalances(seededStore());
    expect(mismatches).toEqual([
      { itemId: 2, sku: 'PLA-001', cachedQuantity: 480, replayedQuantity: 500, difference: -20, movementCount: 1 },
      { itemId: 3, sku: 'PKG-010', cachedQuantity: 12, replayedQuantity: 0, difference: 12, movementCount: 0 }
    ]);
  });

  it('ignores differences inside the tolerance', async () => {
    const mismatches = await compareLedgerBalances(seededStore(), { tolerance: 15 });
    expect(mismatches.map((mismatch) => mismatch.itemId)).toEqual([2]);
  });
});

describe('reconcileLedger', () => {
  it('summarizes the run', async () => {
    const report = await reconcileLedger(seededStore(), { now: at('2026-02-01T02:00:00Z') });
    expect(report.checkedAt).toBe('2026-02-01T02:00:00.000Z');
    expect(report.itemCount).toBe(3);
    expect(report.mismatchCount).toBe(2);
  });
});
