import { Router, type Request, type Response } from 'express';
import { asyncErrorHandler } from '../middleware/validation';
import { stockLevelReportQuerySchema } from '../schemas/reports.schema';
import { buildStockLevelReport, formatStockLevelCsv } from '../services/reports.service';
import { getStockService } from '../services/stock.service';

const router = Router();

router.get(
  '/reports/stock-levels',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const parsed = stockLevelReportQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    const rows = await buildStockLevelReport(getStockService());
    if (parsed.data.format === 'csv') {
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', 'attachment; filename="stock-levels.csv"');
      return res.send(formatStockLevelCsv(rows));
    }
    return res.json({ data: rows });
  })
);

export default router;
