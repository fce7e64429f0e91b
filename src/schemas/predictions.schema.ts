import { z } from 'zod';

const lookbackDays = z.coerce.number().int().positive().max(3650);

export const itemPredictionQuerySchema = z.object({
  lookback_days: lookbackDays.optional()
});

export const shortageDatesQuerySchema = z.object({
  days_lookback: lookbackDays.optional()
});
