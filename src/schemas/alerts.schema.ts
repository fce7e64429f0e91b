import { z } from 'zod';
import { parseStockStatus } from '../domains/stock/internal/statusClassifier';

export const stockStatusSchema = z.string().transform((value, ctx) => {
  const status = parseStockStatus(value);
  if (!status) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Status must be one of NORMAL, WARNING, CRITICAL (or green, yellow, red).'
    });
    return z.NEVER;
  }
  return status;
});

export const alertListQuerySchema = z.object({
  status: stockStatusSchema.optional(),
  supplier: z.string().min(1).optional(),
  warehouse: z.string().min(1).optional()
});
