import { z } from 'zod';

/** JSON numbers, or numeric strings with content. `null`, `''` and booleans are rejected. */
export const numericInput = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number());
