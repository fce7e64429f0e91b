import cron, { type ScheduledTask } from 'node-cron';
import { reconcileLedger, type LedgerReconcileReport } from '../services/ledgerReconcile.service';
import type { StockService } from '../services/stock.service';

const LEDGER_RECONCILE_JOB = 'ledger-reconcile';

let scheduled: ScheduledTask | null = null;

export async function runLedgerReconcile(
  service: StockService,
  options: { mode?: 'report' | 'strict'; tolerance?: number } = {}
): Promise<LedgerReconcileReport> {
  const report = await reconcileLedger(service.store, { tolerance: options.tolerance });

  console.log(
    JSON.stringify({
      event: 'ledger_reconcile',
      store: service.store.kind,
      itemCount: report.itemCount,
      mismatchCount: report.mismatchCount,
      topMismatches: report.mismatches.slice(0, 10),
      timestamp: report.checkedAt
    })
  );

  if (options.mode === 'strict' && report.mismatchCount > 0) {
    throw new Error(`LEDGER_RECONCILE_STRICT_FAILED: ${report.mismatchCount} item(s) diverge from their history`);
  }
  return report;
}

/** One scheduled run. Failures are logged; the next tick still runs. */
export async function ledgerReconcileTick(service: StockService): Promise<void> {
  const startTime = Date.now();
  try {
    await runLedgerReconcile(service);
    console.log(`✅ Job "${LEDGER_RECONCILE_JOB}" completed in ${Date.now() - startTime}ms`);
  } catch (error) {
    console.error(`❌ Job "${LEDGER_RECONCILE_JOB}" failed:`, error);
  }
}

/** Runs the reconcile on `schedule` (cron, UTC) until `stopLedgerReconcileJob`. */
export function startLedgerReconcileJob(service: StockService, schedule: string): void {
  if (!cron.validate(schedule)) {
    throw new Error(`Invalid cron expression for job "${LEDGER_RECONCILE_JOB}": ${schedule}`);
  }
  if (scheduled) {
    console.warn(`⚠️  Job "${LEDGER_RECONCILE_JOB}" already running, skipping`);
    return;
  }
  scheduled = cron.schedule(schedule, () => ledgerReconcileTick(service), { timezone: 'UTC' });
  console.log(`📅 Job "${LEDGER_RECONCILE_JOB}" scheduled: ${schedule} (UTC)`);
}

export function stopLedgerReconcileJob(): boolean {
  if (!scheduled) return false;
  scheduled.stop();
  scheduled = null;
  console.log(`🛑 Stopped job "${LEDGER_RECONCILE_JOB}"`);
  return true;
}
