import { Router, type Request, type Response } from 'express';
import { asyncErrorHandler } from '../middleware/validation';
import { reconcileQuerySchema } from '../schemas/reports.schema';
import { reconcileLedger } from '../services/ledgerReconcile.service';
import { getStockService } from '../services/stock.service';

const router = Router();

router.get(
  '/ledger/reconcile',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const parsed = reconcileQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    const report = await reconcileLedger(getStockService().store, { tolerance: parsed.data.tolerance });
    return res.json(report);
  })
);

export default router;
