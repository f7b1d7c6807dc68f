// Logger exports
export { logger, createServiceLogger } from './logger';

// Log context exports
export {
  LogContext,
  asyncLocalStorage,
  runWithLogContext,
  getCorrelationId,
  getLogContext,
  addLogContext,
} from './log-context';

// Correlation middleware
export { correlationMiddleware, CORRELATION_HEADER } from './correlation';

// Metrics exports
export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  salesCommittedTotal,
  salesRejectedTotal,
  saleItemsTotal,
  persistenceFailuresTotal,
  exportWritesTotal,
  resetMetrics,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Metrics middleware
export { metricsMiddleware } from './metrics.middleware';
