import { z } from 'zod';
import { MOVEMENT_TYPES } from '../domains/stock/types';
import { numericInput } from './common.schema';

// Sign and range checks belong to the ledger; the schema only requires a number.
export const movementCreateSchema = z.object({
  movement_type: z.enum(MOVEMENT_TYPES),
  quantity: numericInput,
  notes: z.string().max(2000).nullish()
});

export const stockMovementCreateSchema = movementCreateSchema.extend({
  item_id: z.coerce.number().int().positive()
});

export const movementListQuerySchema = z.object({
  since: z.coerce.date().optional()
});
