import { isStockError } from '../domains/stock/errors';
import { initStockService, shutdownStockService, type StockService } from '../services/stock.service';
import { error } from './format';

/**
 * Opens the configured store for one command, closes it afterwards and turns failures
 * into a non-zero exit code.
 */
export async function withStockService(task: (service: StockService) => Promise<void>): Promise<void> {
  try {
    const service = await initStockService();
    await task(service);
  } catch (err) {
    if (isStockError(err)) {
      error(`${err.code} ${JSON.stringify(err.details)}`);
    } else {
      error(err instanceof Error ? err.message : String(err));
    }
    process.exitCode = 1;
  } finally {
    await shutdownStockService();
  }
}

export function parseIntegerArg(value: string, label: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${label} must be a positive integer`);
  }
  return parsed;
}

export function parseNumberArg(value: string, label: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new Error(`${label} must be a finite number`);
  }
  return parsed;
}
