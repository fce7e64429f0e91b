export { asyncErrorHandler, createErrorResponse, stockErrorMap, type ErrorResponse, type StockErrorMap } from './errors';
export { parseItemIdParam } from './params';
