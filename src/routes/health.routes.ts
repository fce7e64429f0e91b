import { Router, type Request, type Response } from 'express';
import { withTimeout } from '../lib/timeouts';
import { activeEventClientCount } from '../lib/events';
import { getStockService } from '../services/stock.service';

const router = Router();

const STORE_TIMEOUT_MS = Number(process.env.HEALTH_STORE_TIMEOUT_MS || 1500);

router.get('/health/live', (_req: Request, res: Response) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

router.get('/health/ready', async (_req: Request, res: Response) => {
  const start = Date.now();
  const details: Record<string, unknown> = {};
  let ready = true;

  try {
    const service = getStockService();
    await withTimeout(service.store.ping(), STORE_TIMEOUT_MS, 'store');
    details.store = { ok: true, kind: service.store.kind };
  } catch (error) {
    details.store = { ok: false, error: error instanceof Error ? error.message : String(error) };
    ready = false;
  }

  details.eventClients = activeEventClientCount();

  res.status(ready ? 200 : 503).json({
    status: ready ? 'ready' : 'not_ready',
    durationMs: Date.now() - start,
    details,
    timestamp: new Date().toISOString()
  });
});

export default router;
