import { Router, type Request, type Response } from 'express';
import { asyncErrorHandler } from '../middleware/validation';
import { alertListQuerySchema } from '../schemas/alerts.schema';
import { mapAlert } from '../services/stock.mappers';
import { getStockService } from '../services/stock.service';

const router = Router();

router.get(
  '/stock-alerts',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const parsed = alertListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    const { status, supplier, warehouse } = parsed.data;
    const alerts = await getStockService().listAlerts({
      status,
      supplierRef: supplier,
      warehouseRef: warehouse
    });
    return res.json({ data: alerts.map(mapAlert) });
  })
);

export default router;
