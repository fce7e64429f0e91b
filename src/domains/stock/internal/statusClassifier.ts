import { STATUS_COLOR, STOCK_STATUSES, type StockStatus } from '../types';

export const DEFAULT_WARNING_MULTIPLIER = 1.5;

export function classify(
  currentQuantity: number,
  minQuantity: number,
  warningMultiplier: number = DEFAULT_WARNING_MULTIPLIER
): StockStatus {
  if (currentQuantity <= 0) {
    return 'CRITICAL';
  }
  if (currentQuantity <= minQuantity * warningMultiplier) {
    return 'WARNING';
  }
  return 'NORMAL';
}

export function statusColor(status: StockStatus): (typeof STATUS_COLOR)[StockStatus] {
  return STATUS_COLOR[status];
}

/**
 * Accepts `NORMAL`/`WARNING`/`CRITICAL` in any case, plus the legacy colors
 * (`green`/`yellow`/`red`).
 */
export function parseStockStatus(value: string): StockStatus | null {
  const normalized = value.trim().toUpperCase();
  for (const status of STOCK_STATUSES) {
    if (status === normalized || STATUS_COLOR[status].toUpperCase() === normalized) {
      return status;
    }
  }
  return null;
}
