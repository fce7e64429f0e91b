export const MOVEMENT_KINDS = ['IN', 'OUT', 'ADJUST'] as const;
export type MovementKind = (typeof MOVEMENT_KINDS)[number];

export const STOCK_STATUSES = ['NORMAL', 'WARNING', 'CRITICAL'] as const;
export type StockStatus = (typeof STOCK_STATUSES)[number];

export const MATERIAL_CATEGORIES = ['raw_material', 'packaging', 'chemical', 'component', 'other'] as const;
export type MaterialCategory = (typeof MATERIAL_CATEGORIES)[number];

export const UNIT_TYPES = ['kg', 'g', 'L', 'mL', 'pc', 'm', 'cm'] as const;
export type UnitType = (typeof UNIT_TYPES)[number];

/**
 * Persisted movement type values. These are shared with existing data files and the
 * `stock_movements.movement_type` column, so they must not change.
 */
export const MOVEMENT_TYPE_BY_KIND = {
  IN: 'in',
  OUT: 'out',
  ADJUST: 'adjustment'
} as const satisfies Record<MovementKind, string>;

export type MovementType = (typeof MOVEMENT_TYPE_BY_KIND)[MovementKind];

export const MOVEMENT_TYPES = ['in', 'out', 'adjustment'] as const satisfies readonly MovementType[];

export const KIND_BY_MOVEMENT_TYPE = {
  in: 'IN',
  out: 'OUT',
  adjustment: 'ADJUST'
} as const satisfies Record<MovementType, MovementKind>;

export const STATUS_COLOR = {
  NORMAL: 'green',
  WARNING: 'yellow',
  CRITICAL: 'red'
} as const satisfies Record<StockStatus, string>;

export type ItemRecord = {
  id: number;
  name: string;
  sku: string;
  category: string;
  unit: string;
  currentQuantity: number;
  minQuantity: number;
  supplierRef: string | null;
  warehouseRef: string | null;
};

export type MovementRecord = {
  id: number;
  itemId: number;
  kind: MovementKind;
  quantity: number;
  actorId: string | null;
  note: string | null;
  timestamp: Date;
};

export function kindFromMovementType(value: string): MovementKind | null {
  for (const type of MOVEMENT_TYPES) {
    if (type === value) return KIND_BY_MOVEMENT_TYPE[type];
  }
  return null;
}

export function cloneItem(item: ItemRecord): ItemRecord {
  return { ...item };
}

export function cloneMovement(movement: MovementRecord): MovementRecord {
  return { ...movement, timestamp: new Date(movement.timestamp.getTime()) };
}
