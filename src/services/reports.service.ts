import { formatCsv } from '../lib/csv';
import type { StockService } from './stock.service';

export const STOCK_LEVEL_COLUMNS = [
  'id',
  'name',
  'sku',
  'current_quantity',
  'min_quantity',
  'unit',
  'status',
  'warehouse',
  'supplier'
] as const;

export type StockLevelRow = {
  id: number;
  name: string;
  sku: string;
  current_quantity: number;
  min_quantity: number;
  unit: string;
  status: string;
  warehouse: string | null;
  supplier: string | null;
};

/** One row per item; `status` carries the legacy color code (`green`/`yellow`/`red`). */
export async function buildStockLevelReport(service: StockService): Promise<StockLevelRow[]> {
  const items = await service.listItems();
  return items.map((item) => ({
    id: item.id,
    name: item.name,
    sku: item.sku,
    current_quantity: item.currentQuantity,
    min_quantity: item.minQuantity,
    unit: item.unit,
    status: item.statusColor,
    warehouse: item.warehouseRef,
    supplier: item.supplierRef
  }));
}

export function formatStockLevelCsv(rows: StockLevelRow[]): string {
  return formatCsv(STOCK_LEVEL_COLUMNS, rows);
}
