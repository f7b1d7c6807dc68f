import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'booth-ledger' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2],
  registers: [registry],
});

// ============================================
// Sales Metrics
// ============================================

export const salesCommittedTotal = new Counter({
  name: 'sales_committed_total',
  help: 'Sales recorded in the ledger',
  registers: [registry],
});

export const salesRejectedTotal = new Counter({
  name: 'sales_rejected_total',
  help: 'Sale commits rejected before any state change',
  labelNames: ['reason'] as const,
  registers: [registry],
});

export const saleItemsTotal = new Counter({
  name: 'sale_items_total',
  help: 'Units sold across all committed sales',
  registers: [registry],
});

// ============================================
// Storage / Export Metrics
// ============================================

export const persistenceFailuresTotal = new Counter({
  name: 'persistence_failures_total',
  help: 'Blob writes that failed and were tolerated',
  labelNames: ['blob'] as const,
  registers: [registry],
});

export const exportWritesTotal = new Counter({
  name: 'export_writes_total',
  help: 'Export surface writes by mode',
  labelNames: ['mode'] as const, // append, rewrite
  registers: [registry],
});

/**
 * Reset all metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  registry.resetMetrics();
};

/**
 * Get metrics in Prometheus format
 */
export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

export const getMetricsContentType = (): string => {
  return registry.contentType;
};
