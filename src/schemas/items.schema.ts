import { z } from 'zod';
import { MATERIAL_CATEGORIES, UNIT_TYPES } from '../domains/stock/types';
import { numericInput } from './common.schema';

const optionalRef = z
  .string()
  .trim()
  .nullish()
  .transform((value) => (value ? value : null));

const nonNegativeQuantity = z.number().finite().nonnegative();

/** Item fields as the stock service takes them, whichever adapter they came from. */
export const newItemSchema = z.object({
  name: z.string().trim().min(1),
  sku: z.string().trim().min(1),
  category: z.enum(MATERIAL_CATEGORIES),
  unit: z.enum(UNIT_TYPES),
  minQuantity: nonNegativeQuantity,
  supplierRef: optionalRef,
  warehouseRef: optionalRef
});

export const itemListQuerySchema = z.object({
  supplier: z.string().min(1).optional(),
  warehouse: z.string().min(1).optional(),
  category: z.enum(MATERIAL_CATEGORIES).optional(),
  search: z.string().trim().min(1).optional()
});

export const itemCreateSchema = z.object({
  name: newItemSchema.shape.name,
  sku: newItemSchema.shape.sku,
  category: newItemSchema.shape.category.default('raw_material'),
  unit: newItemSchema.shape.unit,
  min_quantity: numericInput.pipe(nonNegativeQuantity).default(0),
  opening_quantity: numericInput.pipe(nonNegativeQuantity).optional(),
  supplier: optionalRef,
  warehouse: optionalRef
});
