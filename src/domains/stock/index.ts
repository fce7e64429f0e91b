export * from './types';
export { StockError, STOCK_ERROR_CODES, isStockError, storageUnavailable, type StockErrorCode } from './errors';
export type {
  CommittedMovement,
  ItemCatalog,
  ItemFilter,
  MovementPlan,
  NewItem,
  StockStorageKind,
  StockStore
} from './store';

export { classify, parseStockStatus, statusColor, DEFAULT_WARNING_MULTIPLIER } from './internal/statusClassifier';

export {
  MovementLedger,
  assertValidQuantity,
  nextQuantityFor,
  replayQuantity,
  type ApplyMovementInput,
  type MovementLedgerOptions,
  type OverdrawPolicy
} from './internal/movementLedger';

export {
  averageDailyUsage,
  predictShortage,
  predictShortageDetailed,
  projectShortageDate,
  resolveLookbackDays,
  DEFAULT_LOOKBACK_DAYS,
  SHORTAGE_FALLBACK_DAYS,
  type MovementHistory,
  type PredictShortageOptions,
  type ShortagePrediction
} from './internal/shortagePredictor';

export { listAlerts, type AlertFilters, type StockAlert } from './internal/alertAggregator';
