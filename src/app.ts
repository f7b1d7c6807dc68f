import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { PosContext } from './context';
import { errorHandler, notFoundHandler } from './middlewares';
import { createHealthRoutes } from './routes/health';
import { createCatalogRoutes } from './services/catalog';
import { createEventRoutes } from './services/event';
import { createExportRoutes } from './services/export';
import { createTransactionRoutes } from './services/ledger';
import { createSaleRoutes, createSessionRoutes } from './services/sale';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
} from './observability';

export const createApp = (context: PosContext): Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));
  app.use(express.urlencoded({ extended: true }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);

  // Routes
  app.use('/health', createHealthRoutes(context.store));
  app.use('/events', createEventRoutes(context.events, context.summary));
  app.use('/products', createCatalogRoutes(context.catalog));
  app.use('/session', createSessionRoutes(context));
  app.use('/sales', createSaleRoutes(context));
  app.use('/transactions', createTransactionRoutes(context));
  app.use('/export', createExportRoutes(context.exporter, context.ledger));

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      res.status(500).send('Error collecting metrics');
    }
  });

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'Booth Ledger API',
      version: '1.0.0',
      description: 'Offline point-of-sale inventory and sales ledger',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
