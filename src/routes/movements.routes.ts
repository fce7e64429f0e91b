import { Router, type Request, type Response } from 'express';
import { emitEvent } from '../lib/events';
import { requireAuth } from '../middleware/auth.middleware';
import { asyncErrorHandler, parseItemIdParam } from '../middleware/validation';
import { movementCreateSchema, movementListQuerySchema, stockMovementCreateSchema } from '../schemas/movements.schema';
import { mapItem, mapMovement } from '../services/stock.mappers';
import { getStockService, type AppliedMovement } from '../services/stock.service';
import { KIND_BY_MOVEMENT_TYPE, type MovementType } from '../domains/stock/types';

const router = Router();

type MovementBody = {
  movement_type: MovementType;
  quantity: number;
  notes?: string | null;
};

async function applyFromRequest(req: Request, itemId: number, body: MovementBody) {
  const applied = await getStockService().applyMovement({
    itemId,
    kind: KIND_BY_MOVEMENT_TYPE[body.movement_type],
    quantity: body.quantity,
    actorId: req.auth?.userId ?? null,
    note: body.notes ?? null
  });
  publishMovementEvents(applied);
  return applied;
}

function publishMovementEvents(applied: AppliedMovement) {
  emitEvent('stock.movement.applied', {
    itemId: applied.item.id,
    movementId: applied.movement.id,
    kind: applied.movement.kind,
    quantity: applied.movement.quantity,
    previousQuantity: applied.previousQuantity,
    currentQuantity: applied.item.currentQuantity,
    actorId: applied.movement.actorId
  });
  if (applied.statusChanged) {
    emitEvent('stock.status.changed', {
      itemId: applied.item.id,
      previousStatus: applied.previousStatus,
      status: applied.item.status
    });
  }
}

function appliedResponse(applied: AppliedMovement) {
  return {
    movement: mapMovement(applied.movement),
    item: mapItem(applied.item),
    previousQuantity: applied.previousQuantity,
    previousStatus: applied.previousStatus
  };
}

router.get(
  '/items/:id/movements',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const itemId = parseItemIdParam(req);
    if (itemId === null) {
      return res.status(400).json({ error: 'Invalid item id.' });
    }
    const parsed = movementListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    const movements = await getStockService().history(itemId, parsed.data.since);
    return res.json({ data: movements.map(mapMovement) });
  })
);

router.post(
  '/items/:id/movements',
  requireAuth,
  asyncErrorHandler(async (req: Request, res: Response) => {
    const itemId = parseItemIdParam(req);
    if (itemId === null) {
      return res.status(400).json({ error: 'Invalid item id.' });
    }
    const parsed = movementCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    const applied = await applyFromRequest(req, itemId, parsed.data);
    return res.status(201).json(appliedResponse(applied));
  })
);

router.post(
  '/stock-movements',
  requireAuth,
  asyncErrorHandler(async (req: Request, res: Response) => {
    const parsed = stockMovementCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    const applied = await applyFromRequest(req, parsed.data.item_id, parsed.data);
    return res.status(201).json(appliedResponse(applied));
  })
);

export default router;
