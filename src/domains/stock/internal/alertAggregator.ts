import type { ItemCatalog } from '../store';
import type { ItemRecord, StockStatus } from '../types';
import { classify, DEFAULT_WARNING_MULTIPLIER } from './statusClassifier';

export type AlertFilters = {
  status?: StockStatus;
  supplierRef?: string;
  warehouseRef?: string;
};

export type StockAlert = {
  item: ItemRecord;
  status: StockStatus;
};

/**
 * Classifies every item matching the supplier/warehouse filters. Without a status filter
 * only WARNING and CRITICAL items are returned; an explicit status (NORMAL included) returns
 * exactly that status. Order follows the catalog.
 */
export async function listAlerts(
  catalog: ItemCatalog,
  filters: AlertFilters = {},
  warningMultiplier: number = DEFAULT_WARNING_MULTIPLIER
): Promise<StockAlert[]> {
  const items = await catalog.listItems({
    supplierRef: filters.supplierRef,
    warehouseRef: filters.warehouseRef
  });

  const alerts: StockAlert[] = [];
  for (const item of items) {
    if (filters.supplierRef !== undefined && item.supplierRef !== filters.supplierRef) continue;
    if (filters.warehouseRef !== undefined && item.warehouseRef !== filters.warehouseRef) continue;

    const status = classify(item.currentQuantity, item.minQuantity, warningMultiplier);
    const wanted = filters.status === undefined ? status !== 'NORMAL' : status === filters.status;
    if (wanted) {
      alerts.push({ item, status });
    }
  }
  return alerts;
}
