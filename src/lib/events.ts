import type { Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { MovementKind, StockStatus } from '../domains/stock/types';

export type StockEventMap = {
  'stock.movement.applied': {
    itemId: number;
    movementId: number;
    kind: MovementKind;
    quantity: number;
    previousQuantity: number;
    currentQuantity: number;
    actorId: string | null;
  };
  'stock.status.changed': {
    itemId: number;
    previousStatus: StockStatus;
    status: StockStatus;
  };
};

export type StockEventType = keyof StockEventMap;

export type ServerEvent<K extends string = string, D = unknown> = {
  id: string;
  type: K;
  occurredAt: string;
  data: D;
};

type Subscriber = {
  res: Response;
  heartbeat: NodeJS.Timeout;
  // null receives every item
  itemId: number | null;
};

const subscribers = new Map<string, Subscriber>();

const HEARTBEAT_MS = 25000;
const RETRY_MS = 3000;

export function formatEvent(event: ServerEvent) {
  return `id: ${event.id}\nevent: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}

/**
 * Opens a server-sent event stream. With `itemId` set the client only receives events for
 * that item.
 */
export function registerEventStream(req: Request, res: Response, options: { itemId?: number | null } = {}) {
  res.status(200);
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Accel-Buffering', 'no');
  res.write(`retry: ${RETRY_MS}\n\n`);
  res.flushHeaders();

  const clientId = uuidv4();
  const heartbeat = setInterval(() => {
    if (!res.writableEnded) res.write(`: keep-alive ${Date.now()}\n\n`);
  }, HEARTBEAT_MS);
  subscribers.set(clientId, { res, heartbeat, itemId: options.itemId ?? null });

  res.write(
    formatEvent({
      id: uuidv4(),
      type: 'system.ready',
      occurredAt: new Date().toISOString(),
      data: { clientId, itemId: options.itemId ?? null }
    })
  );

  const unsubscribe = () => {
    const subscriber = subscribers.get(clientId);
    if (!subscriber) return;
    clearInterval(subscriber.heartbeat);
    subscribers.delete(clientId);
  };
  req.on('close', unsubscribe);
  res.on('close', unsubscribe);
}

export function emitEvent<K extends StockEventType>(type: K, data: StockEventMap[K]): ServerEvent<K, StockEventMap[K]> {
  const event = { id: uuidv4(), type, occurredAt: new Date().toISOString(), data };
  const frame = formatEvent(event);

  for (const subscriber of subscribers.values()) {
    if (subscriber.res.writableEnded) continue;
    if (subscriber.itemId !== null && subscriber.itemId !== data.itemId) continue;
    subscriber.res.write(frame);
  }
  return event;
}

export function activeEventClientCount() {
  return subscribers.size;
}
