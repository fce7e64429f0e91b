import 'dotenv/config';
import { createApp } from './app';
import { resolveSchedulerStartupMode } from './config/schedulerStartup';
import { startLedgerReconcileJob, stopLedgerReconcileJob } from './jobs/ledgerReconcile.job';
import { initStockService, shutdownStockService } from './services/stock.service';

const PORT = Number(process.env.PORT) || 3000;

async function main() {
  const service = await initStockService();
  console.log(`📦 Stock store opened (${service.store.kind})`);

  const scheduler = resolveSchedulerStartupMode();
  if (scheduler.schedulerEnabled) {
    startLedgerReconcileJob(service, scheduler.ledgerReconcileCron);
  }

  const server = createApp().listen(PORT, () => {
    console.log(`Stock Monitor API listening on port ${PORT}`);
  });

  const shutdown = (signal: string) => {
    console.log(`\n🛑 ${signal} received, shutting down...`);
    stopLedgerReconcileJob();
    server.close(() => {
      shutdownStockService()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Failed to close stock store', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  console.error('Failed to start Stock Monitor API', error);
  process.exit(1);
});
