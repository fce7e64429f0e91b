import { Router, type Request, type Response } from 'express';
import { asyncErrorHandler, parseItemIdParam } from '../middleware/validation';
import { itemPredictionQuerySchema, shortageDatesQuerySchema } from '../schemas/predictions.schema';
import { mapItem, mapPrediction } from '../services/stock.mappers';
import { getStockService } from '../services/stock.service';

const router = Router();

router.get(
  '/items/:id/shortage-prediction',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const itemId = parseItemIdParam(req);
    if (itemId === null) {
      return res.status(400).json({ error: 'Invalid item id.' });
    }
    const parsed = itemPredictionQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    const prediction = await getStockService().predictShortage(itemId, parsed.data.lookback_days);
    return res.json(mapPrediction(prediction));
  })
);

router.get(
  '/predictions/shortage-dates',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const parsed = shortageDatesQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    const predictions = await getStockService().predictAll(parsed.data.days_lookback);
    return res.json({
      data: predictions.map((prediction) => ({
        ...mapPrediction(prediction),
        item: mapItem(prediction.item)
      }))
    });
  })
);

export default router;
