import { Router, type Request, type Response } from 'express';
import { requireAuth } from '../middleware/auth.middleware';
import { asyncErrorHandler, parseItemIdParam } from '../middleware/validation';
import { itemCreateSchema, itemListQuerySchema } from '../schemas/items.schema';
import { mapItem } from '../services/stock.mappers';
import { getStockService } from '../services/stock.service';
import { statusColor } from '../domains/stock/internal/statusClassifier';

const router = Router();

router.get(
  '/items',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const parsed = itemListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    const { supplier, warehouse, category, search } = parsed.data;
    const items = await getStockService().listItems({
      supplierRef: supplier,
      warehouseRef: warehouse,
      category,
      search
    });
    return res.json({ data: items.map(mapItem) });
  })
);

router.post(
  '/items',
  requireAuth,
  asyncErrorHandler(async (req: Request, res: Response) => {
    const parsed = itemCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    const body = parsed.data;
    const item = await getStockService().createItem(
      {
        name: body.name,
        sku: body.sku,
        category: body.category,
        unit: body.unit,
        minQuantity: body.min_quantity,
        supplierRef: body.supplier,
        warehouseRef: body.warehouse,
        openingQuantity: body.opening_quantity
      },
      req.auth?.userId ?? null
    );
    return res.status(201).json(mapItem(item));
  })
);

router.get(
  '/items/:id',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const itemId = parseItemIdParam(req);
    if (itemId === null) {
      return res.status(400).json({ error: 'Invalid item id.' });
    }
    const service = getStockService();
    const item = await service.getItem(itemId);
    return res.json(mapItem(service.toItemView(item)));
  })
);

router.get(
  '/items/:id/status',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const itemId = parseItemIdParam(req);
    if (itemId === null) {
      return res.status(400).json({ error: 'Invalid item id.' });
    }
    const status = await getStockService().getStatus(itemId);
    return res.json({ itemId, status, statusColor: statusColor(status) });
  })
);

export default router;
