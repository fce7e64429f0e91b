import { z } from 'zod';

export const stockLevelReportQuerySchema = z.object({
  format: z.enum(['json', 'csv']).default('json')
});

export const reconcileQuerySchema = z.object({
  tolerance: z.coerce.number().finite().nonnegative().optional()
});
