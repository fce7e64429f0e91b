import type { Request } from 'express';
import { z } from 'zod';

const itemIdSchema = z.coerce.number().int().positive();

/** Resolves `:id` as a positive integer item id, or null when it is not one. */
export function parseItemIdParam(req: Request, paramName: string = 'id'): number | null {
  const parsed = itemIdSchema.safeParse(req.params[paramName]);
  return parsed.success ? parsed.data : null;
}
