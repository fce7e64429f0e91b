import type { OverdrawPolicy } from '../domains/stock/internal/movementLedger';
import { DEFAULT_WARNING_MULTIPLIER } from '../domains/stock/internal/statusClassifier';
import { DEFAULT_LOOKBACK_DAYS } from '../domains/stock/internal/shortagePredictor';
import { parseNumber } from './parse';

export type StockPolicy = {
  warningMultiplier: number;
  defaultLookbackDays: number;
  overdrawPolicy: OverdrawPolicy;
};

function parseOverdrawPolicy(value: string | undefined): OverdrawPolicy {
  return value?.trim().toLowerCase() === 'reject' ? 'reject' : 'clamp';
}

function positiveOr(value: number, fallback: number): number {
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

export function getStockPolicy(env: NodeJS.ProcessEnv = process.env): StockPolicy {
  return {
    warningMultiplier: positiveOr(
      parseNumber(env.STOCK_WARNING_MULTIPLIER, DEFAULT_WARNING_MULTIPLIER),
      DEFAULT_WARNING_MULTIPLIER
    ),
    defaultLookbackDays: positiveOr(parseNumber(env.SHORTAGE_LOOKBACK_DAYS, DEFAULT_LOOKBACK_DAYS), DEFAULT_LOOKBACK_DAYS),
    overdrawPolicy: parseOverdrawPolicy(env.STOCK_OUT_OVERDRAW_POLICY)
  };
}
