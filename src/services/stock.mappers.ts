import type { StockAlert } from '../domains/stock/internal/alertAggregator';
import type { ShortagePrediction } from '../domains/stock/internal/shortagePredictor';
import { statusColor } from '../domains/stock/internal/statusClassifier';
import { MOVEMENT_TYPE_BY_KIND, type MovementRecord } from '../domains/stock/types';
import type { ItemView } from './stock.service';

export function mapItem(item: ItemView) {
  return {
    id: item.id,
    name: item.name,
    sku: item.sku,
    category: item.category,
    unit: item.unit,
    currentQuantity: item.currentQuantity,
    minQuantity: item.minQuantity,
    supplier: item.supplierRef,
    warehouse: item.warehouseRef,
    status: item.status,
    statusColor: item.statusColor
  };
}

export function mapMovement(movement: MovementRecord) {
  return {
    id: movement.id,
    itemId: movement.itemId,
    kind: movement.kind,
    movementType: MOVEMENT_TYPE_BY_KIND[movement.kind],
    quantity: movement.quantity,
    actorId: movement.actorId,
    notes: movement.note,
    timestamp: movement.timestamp.toISOString()
  };
}

export function mapAlert(alert: StockAlert) {
  return {
    itemId: alert.item.id,
    itemName: alert.item.name,
    sku: alert.item.sku,
    currentQuantity: alert.item.currentQuantity,
    minQuantity: alert.item.minQuantity,
    status: alert.status,
    statusColor: statusColor(alert.status),
    supplier: alert.item.supplierRef,
    warehouse: alert.item.warehouseRef
  };
}

export function mapPrediction(prediction: ShortagePrediction) {
  return {
    itemId: prediction.itemId,
    shortageDate: prediction.shortageDate.toISOString(),
    avgDailyUsage: prediction.avgDailyUsage,
    daysRemaining: prediction.daysRemaining,
    reliable: prediction.reliable,
    lookbackDays: prediction.lookbackDays
  };
}
