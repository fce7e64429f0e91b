import { Command } from 'commander';
import { parseStockStatus } from '../../domains/stock/internal/statusClassifier';
import type { StockStatus } from '../../domains/stock/types';
import type { StockService } from '../../services/stock.service';
import { colorStatus, heading, json, table, warn } from '../format';
import { parseIntegerArg, withStockService } from '../session';

type ItemPrediction = Awaited<ReturnType<StockService['predictAll']>>[number];

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function registerInsightCommands(program: Command): void {
  program
    .command('alerts')
    .description('List items that need attention (WARNING or CRITICAL by default)')
    .option('--status <status>', 'NORMAL, WARNING or CRITICAL (green, yellow, red also accepted)')
    .option('--supplier <ref>', 'Only items from this supplier')
    .option('--warehouse <ref>', 'Only items stored in this warehouse')
    .option('--json', 'Print raw JSON')
    .action(async (opts: { status?: string; supplier?: string; warehouse?: string; json?: boolean }) => {
      await withStockService(async (service) => {
        let status: StockStatus | undefined;
        if (opts.status !== undefined) {
          const parsed = parseStockStatus(opts.status);
          if (!parsed) {
            throw new Error(`unknown status: ${opts.status}`);
          }
          status = parsed;
        }
        const alerts = await service.listAlerts({
          status,
          supplierRef: opts.supplier,
          warehouseRef: opts.warehouse
        });
        if (opts.json) {
          json(alerts);
          return;
        }
        heading(`Stock alerts (${alerts.length})`);
        table(
          alerts.map(({ item, status: itemStatus }) => ({
            ID: item.id,
            SKU: item.sku,
            Name: item.name,
            Qty: item.currentQuantity,
            Min: item.minQuantity,
            Status: colorStatus(itemStatus)
          }))
        );
        console.log();
      });
    });

  program
    .command('predict [itemId]')
    .description('Predict the shortage date of one item, or of every item')
    .option('-l, --lookback <days>', 'Usage lookback window in days')
    .action(async (itemIdArg: string | undefined, opts: { lookback?: string }) => {
      await withStockService(async (service) => {
        const lookback = opts.lookback === undefined ? undefined : parseIntegerArg(opts.lookback, 'lookback');
        let predictions: ItemPrediction[];
        if (itemIdArg === undefined) {
          predictions = await service.predictAll(lookback);
        } else {
          const itemId = parseIntegerArg(itemIdArg, 'itemId');
          const prediction = await service.predictShortage(itemId, lookback);
          predictions = [{ ...prediction, item: service.toItemView(await service.getItem(itemId)) }];
        }
        heading('Shortage predictions');
        table(
          predictions.map((prediction) => ({
            ID: prediction.itemId,
            SKU: prediction.item.sku,
            Qty: prediction.item.currentQuantity,
            'Usage/day': Number(prediction.avgDailyUsage.toFixed(3)),
            'Shortage on': formatDate(prediction.shortageDate),
            Reliable: prediction.reliable ? 'yes' : 'no'
          }))
        );
        if (predictions.some((prediction) => !prediction.reliable)) {
          warn('Items without recent usage show a placeholder date 30 days out.');
        }
        console.log();
      });
    });
}
