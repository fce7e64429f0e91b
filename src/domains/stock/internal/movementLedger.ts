import { KeyedLock } from '../../../lib/keyedLock';
import { roundQuantity } from '../../../lib/numbers';
import { StockError } from '../errors';
import type { CommittedMovement, StockStore } from '../store';
import type { MovementKind, MovementRecord } from '../types';

export type OverdrawPolicy = 'clamp' | 'reject';

export type MovementLedgerOptions = {
  clock?: () => Date;
  overdrawPolicy?: OverdrawPolicy;
};

export type ApplyMovementInput = {
  itemId: number;
  kind: MovementKind;
  quantity: number;
  actorId?: string | null;
  note?: string | null;
};

export function assertValidQuantity(kind: MovementKind, quantity: number): void {
  if (typeof quantity !== 'number' || !Number.isFinite(quantity)) {
    throw new StockError('INVALID_QUANTITY', { kind, quantity });
  }
  if (kind === 'ADJUST' ? quantity < 0 : quantity <= 0) {
    throw new StockError('INVALID_QUANTITY', { kind, quantity });
  }
}

/**
 * Quantity after applying one movement. OUT never drops below zero: under `clamp` the
 * shortfall is discarded, under `reject` it fails with INSUFFICIENT_STOCK.
 */
export function nextQuantityFor(
  kind: MovementKind,
  currentQuantity: number,
  quantity: number,
  overdrawPolicy: OverdrawPolicy = 'clamp'
): number {
  switch (kind) {
    case 'IN':
      return roundQuantity(currentQuantity + quantity);
    case 'OUT': {
      const remaining = roundQuantity(currentQuantity - quantity);
      if (remaining < 0 && overdrawPolicy === 'reject') {
        throw new StockError('INSUFFICIENT_STOCK', { currentQuantity, requested: quantity });
      }
      return Math.max(0, remaining);
    }
    case 'ADJUST':
      return roundQuantity(quantity);
  }
}

/** Folds a movement history (oldest first) into the quantity it implies. */
export function replayQuantity(movements: readonly MovementRecord[], startingQuantity: number = 0): number {
  return movements.reduce(
    (quantity, movement) => nextQuantityFor(movement.kind, quantity, movement.quantity, 'clamp'),
    startingQuantity
  );
}

/**
 * Single writer of item quantities. Every quantity change goes through `apply`, which
 * validates the request, serializes work per item and hands the store one atomic commit.
 */
export class MovementLedger {
  private readonly locks = new KeyedLock<number>();
  private readonly clock: () => Date;
  private readonly overdrawPolicy: OverdrawPolicy;

  constructor(
    private readonly store: StockStore,
    options: MovementLedgerOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.overdrawPolicy = options.overdrawPolicy ?? 'clamp';
  }

  async apply(input: ApplyMovementInput): Promise<MovementRecord> {
    const committed = await this.applyDetailed(input);
    return committed.movement;
  }

  async applyDetailed(input: ApplyMovementInput): Promise<CommittedMovement> {
    assertValidQuantity(input.kind, input.quantity);

    const committed = await this.locks.run(input.itemId, () =>
      this.store.commitMovement(input.itemId, (item) => ({
        kind: input.kind,
        quantity: input.quantity,
        actorId: input.actorId ?? null,
        note: input.note ?? null,
        nextQuantity: nextQuantityFor(input.kind, item.currentQuantity, input.quantity, this.overdrawPolicy),
        requestedAt: this.clock()
      }))
    );

    if (!committed) {
      throw new StockError('ITEM_NOT_FOUND', { itemId: input.itemId });
    }
    return committed;
  }

  async history(itemId: number): Promise<MovementRecord[]> {
    await this.requireItem(itemId);
    return this.store.listMovements(itemId);
  }

  async listRecent(itemId: number, since: Date): Promise<MovementRecord[]> {
    await this.requireItem(itemId);
    return this.store.listMovements(itemId, since);
  }

  private async requireItem(itemId: number): Promise<void> {
    const item = await this.store.getItem(itemId);
    if (!item) {
      throw new StockError('ITEM_NOT_FOUND', { itemId });
    }
  }
}
