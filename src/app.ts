import express from 'express';
import { requestContextMiddleware } from './middleware/requestContext.middleware';
import { requestLoggerMiddleware } from './middleware/requestLogger.middleware';
import healthRouter from './routes/health.routes';
import itemsRouter from './routes/items.routes';
import movementsRouter from './routes/movements.routes';
import alertsRouter from './routes/alerts.routes';
import predictionsRouter from './routes/predictions.routes';
import reportsRouter from './routes/reports.routes';
import ledgerRouter from './routes/ledger.routes';
import eventsRouter from './routes/events.routes';

export function createApp() {
  const app = express();
  app.use(express.json());
  app.use(requestContextMiddleware);
  app.use(requestLoggerMiddleware);

  app.get('/', (_req, res) => {
    res.json({ message: 'Raw Material Stock Monitor API', health: '/health/live' });
  });

  app.use(healthRouter);
  app.use(itemsRouter);
  app.use(movementsRouter);
  app.use(alertsRouter);
  app.use(predictionsRouter);
  app.use(reportsRouter);
  app.use(ledgerRouter);
  app.use(eventsRouter);

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
