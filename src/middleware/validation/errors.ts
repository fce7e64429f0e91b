import type { Request, Response, NextFunction } from 'express';
import { isStockError, type StockError, type StockErrorCode } from '../../domains/stock/errors';
import { currentRequestId } from '../../lib/requestContext';

export type ErrorResponse = {
  status: number;
  body: { error: string; code?: string; details?: Record<string, unknown> };
};

export type StockErrorMap = Record<StockErrorCode, (error: StockError) => ErrorResponse>;

export function createErrorResponse(
  status: number,
  message: string,
  code?: string,
  details?: Record<string, unknown>
): ErrorResponse {
  return { status, body: { error: message, ...(code ? { code } : {}), ...(details ? { details } : {}) } };
}

export const stockErrorMap: StockErrorMap = {
  ITEM_NOT_FOUND: (error) => createErrorResponse(404, 'Item not found.', error.code, error.details),
  INVALID_QUANTITY: (error) =>
    createErrorResponse(
      400,
      'Quantity must be greater than zero for in/out movements and not negative for adjustments.',
      error.code,
      error.details
    ),
  INVALID_ITEM: (error) => createErrorResponse(400, 'Item fields are invalid.', error.code, error.details),
  INSUFFICIENT_STOCK: (error) =>
    createErrorResponse(409, 'Withdrawal exceeds the quantity on hand.', error.code, error.details),
  SKU_CONFLICT: (error) => createErrorResponse(409, 'An item with this SKU already exists.', error.code, error.details),
  // storage details can carry file paths and driver messages; keep them in the logs
  STORAGE_UNAVAILABLE: (error) => createErrorResponse(503, 'Stock storage is unavailable.', error.code)
};

/**
 * Wraps an async route handler: StockErrors are answered through the error map, anything
 * else is logged and answered with 500.
 */
export function asyncErrorHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
  errorMap: StockErrorMap = stockErrorMap
) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await handler(req, res, next);
    } catch (error) {
      if (isStockError(error)) {
        if (error.code === 'STORAGE_UNAVAILABLE') {
          console.error('Stock storage unavailable', {
            requestId: currentRequestId(),
            details: error.details,
            cause: error.cause
          });
        }
        const mapped = errorMap[error.code](error);
        res.status(mapped.status).json(mapped.body);
        return;
      }

      console.error(error);
      res.status(500).json({
        error: 'An internal server error occurred.',
        ...(process.env.NODE_ENV === 'development' && error instanceof Error ? { details: error.message } : {})
      });
    }
  };
}
