import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { registerEventStream } from '../lib/events';

const router = Router();

const eventStreamQuerySchema = z.object({
  item_id: z.coerce.number().int().positive().optional()
});

router.get('/events', (req: Request, res: Response) => {
  const parsed = eventStreamQuerySchema.safeParse(req.query);
  if (!parsed.success) {
    res.status(400).json({ error: parsed.error.flatten() });
    return;
  }
  registerEventStream(req, res, { itemId: parsed.data.item_id ?? null });
});

export default router;
