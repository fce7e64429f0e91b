import { roundQuantity } from '../lib/numbers';
import { replayQuantity } from '../domains/stock/internal/movementLedger';
import type { StockStore } from '../domains/stock/store';

export type LedgerMismatch = {
  itemId: number;
  sku: string;
  cachedQuantity: number;
  replayedQuantity: number;
  difference: number;
  movementCount: number;
};

export type LedgerReconcileReport = {
  checkedAt: string;
  itemCount: number;
  mismatchCount: number;
  mismatches: LedgerMismatch[];
};

const DEFAULT_TOLERANCE = 1e-6;

/**
 * Replays every item's movement history from zero and compares it with the cached
 * `currentQuantity`. Items loaded from legacy data without an opening movement show up
 * here until a stocktake ADJUST is recorded for them.
 */
export async function compareLedgerBalances(
  store: StockStore,
  options: { tolerance?: number } = {}
): Promise<LedgerMismatch[]> {
  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  const items = await store.listItems();
  const mismatches: LedgerMismatch[] = [];

  for (const item of items) {
    const movements = await store.listMovements(item.id);
    const replayedQuantity = replayQuantity(movements);
    const difference = roundQuantity(item.currentQuantity - replayedQuantity);
    if (Math.abs(difference) > tolerance) {
      mismatches.push({
        itemId: item.id,
        sku: item.sku,
        cachedQuantity: item.currentQuantity,
        replayedQuantity,
        difference,
        movementCount: movements.length
      });
    }
  }

  return mismatches.sort((a, b) => Math.abs(b.difference) - Math.abs(a.difference));
}

export async function reconcileLedger(
  store: StockStore,
  options: { tolerance?: number; now?: Date } = {}
): Promise<LedgerReconcileReport> {
  const items = await store.listItems();
  const mismatches = await compareLedgerBalances(store, options);
  return {
    checkedAt: (options.now ?? new Date()).toISOString(),
    itemCount: items.length,
    mismatchCount: mismatches.length,
    mismatches
  };
}
