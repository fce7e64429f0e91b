export const STOCK_ERROR_CODES = [
  'ITEM_NOT_FOUND',
  'INVALID_QUANTITY',
  'INVALID_ITEM',
  'STORAGE_UNAVAILABLE',
  'INSUFFICIENT_STOCK',
  'SKU_CONFLICT'
] as const;

export type StockErrorCode = (typeof STOCK_ERROR_CODES)[number];

/**
 * Coded failure raised by the ledger and the stores. The message is the code itself so
 * adapters can map it without parsing prose.
 */
export class StockError extends Error {
  readonly code: StockErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: StockErrorCode, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(code, options);
    this.name = 'StockError';
    this.code = code;
    this.details = details;
  }
}

export function isStockError(error: unknown, code?: StockErrorCode): error is StockError {
  if (!(error instanceof StockError)) return false;
  return code === undefined || error.code === code;
}

export function storageUnavailable(error: unknown, details: Record<string, unknown> = {}): StockError {
  if (error instanceof StockError) return error;
  const reason = error instanceof Error ? error.message : String(error);
  return new StockError('STORAGE_UNAVAILABLE', { ...details, reason }, { cause: error });
}
