import type { ItemRecord, MovementRecord } from '../types';

export const DEFAULT_LOOKBACK_DAYS = 30;
/** Horizon returned when there is no usage to extrapolate from. Not a forecast. */
export const SHORTAGE_FALLBACK_DAYS = 30;

const DAY_MS = 24 * 60 * 60 * 1000;

export type MovementHistory = {
  listRecent(itemId: number, since: Date): Promise<MovementRecord[]>;
};

export type ShortagePrediction = {
  itemId: number;
  shortageDate: Date;
  avgDailyUsage: number;
  daysRemaining: number | null;
  reliable: boolean;
  lookbackDays: number;
};

export type PredictShortageOptions = {
  avgDailyUsage?: number;
  lookbackDays?: number;
  now?: Date;
};

export function resolveLookbackDays(value: number | undefined, fallback: number = DEFAULT_LOOKBACK_DAYS): number {
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return value;
}

/** Sum of OUT quantities inside `[now - lookbackDays, now]`, spread over the whole window. */
export function averageDailyUsage(movements: readonly MovementRecord[], now: Date, lookbackDays: number): number {
  const windowStart = now.getTime() - lookbackDays * DAY_MS;
  let consumed = 0;
  for (const movement of movements) {
    const at = movement.timestamp.getTime();
    if (movement.kind !== 'OUT' || at < windowStart || at > now.getTime()) continue;
    consumed += movement.quantity;
  }
  return consumed / lookbackDays;
}

export function projectShortageDate(
  currentQuantity: number,
  avgDailyUsage: number,
  now: Date
): Pick<ShortagePrediction, 'shortageDate' | 'daysRemaining' | 'reliable'> {
  if (!Number.isFinite(avgDailyUsage) || avgDailyUsage <= 0) {
    return {
      shortageDate: new Date(now.getTime() + SHORTAGE_FALLBACK_DAYS * DAY_MS),
      daysRemaining: null,
      reliable: false
    };
  }
  if (currentQuantity <= 0) {
    return { shortageDate: new Date(now.getTime()), daysRemaining: 0, reliable: true };
  }
  const daysRemaining = currentQuantity / avgDailyUsage;
  return {
    shortageDate: new Date(now.getTime() + daysRemaining * DAY_MS),
    daysRemaining,
    reliable: true
  };
}

export async function predictShortageDetailed(
  history: MovementHistory,
  item: ItemRecord,
  options: PredictShortageOptions = {}
): Promise<ShortagePrediction> {
  const now = options.now ?? new Date();
  const lookbackDays = resolveLookbackDays(options.lookbackDays);

  let avgDailyUsage = options.avgDailyUsage;
  if (avgDailyUsage === undefined) {
    const since = new Date(now.getTime() - lookbackDays * DAY_MS);
    const movements = await history.listRecent(item.id, since);
    avgDailyUsage = averageDailyUsage(movements, now, lookbackDays);
  }

  return {
    itemId: item.id,
    avgDailyUsage,
    lookbackDays,
    ...projectShortageDate(item.currentQuantity, avgDailyUsage, now)
  };
}

export async function predictShortage(
  history: MovementHistory,
  item: ItemRecord,
  options: PredictShortageOptions = {}
): Promise<Date> {
  const prediction = await predictShortageDetailed(history, item, options);
  return prediction.shortageDate;
}
