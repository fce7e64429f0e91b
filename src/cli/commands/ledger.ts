import { Command } from 'commander';
import { runLedgerReconcile } from '../../jobs/ledgerReconcile.job';
import { buildStockLevelReport, formatStockLevelCsv } from '../../services/reports.service';
import { json, success, table, warn } from '../format';
import { parseNumberArg, withStockService } from '../session';

export function registerLedgerCommands(program: Command): void {
  program
    .command('report')
    .description('Print the stock level report')
    .option('-f, --format <format>', 'csv or json', 'csv')
    .action(async (opts: { format: string }) => {
      await withStockService(async (service) => {
        const rows = await buildStockLevelReport(service);
        if (opts.format === 'json') {
          json(rows);
          return;
        }
        if (opts.format !== 'csv') {
          throw new Error('format must be csv or json');
        }
        process.stdout.write(formatStockLevelCsv(rows));
      });
    });

  program
    .command('reconcile')
    .description('Replay every movement history and compare it with the stored quantities')
    .option('-t, --tolerance <qty>', 'Largest difference treated as equal')
    .option('--strict', 'Exit non-zero when any item disagrees')
    .action(async (opts: { tolerance?: string; strict?: boolean }) => {
      await withStockService(async (service) => {
        const report = await runLedgerReconcile(service, {
          mode: opts.strict ? 'strict' : 'report',
          tolerance: opts.tolerance === undefined ? undefined : parseNumberArg(opts.tolerance, 'tolerance')
        });
        if (report.mismatchCount === 0) {
          success(`Ledger matches for ${report.itemCount} items`);
          return;
        }
        warn(`${report.mismatchCount} of ${report.itemCount} items disagree with their history`);
        table(
          report.mismatches.map((mismatch) => ({
            ID: mismatch.itemId,
            SKU: mismatch.sku,
            Stored: mismatch.cachedQuantity,
            Replayed: mismatch.replayedQuantity,
            Difference: mismatch.difference
          }))
        );
      });
    });
}
