import { Registry, Counter, Gauge, collectDefaultMetrics } from 'prom-client';

// Create registry
export const register = new Registry();

/**
 * Process metrics (CPU, memory, event loop). Called once by the service
 * bootstrap rather than on import, so tests do not start collectors.
 */
export function enableDefaultMetrics(): void {
  collectDefaultMetrics({ register });
}

// ==================== STORE METRICS ====================

export const storeOperationsTotal = new Counter({
  name: 'store_operations_total',
  help: 'Total number of store operations',
  labelNames: ['operation', 'outcome'], // outcome: ok/retried/failed
  registers: [register],
});

export const storeReconnectionsTotal = new Counter({
  name: 'store_reconnections_total',
  help: 'Total number of reconnection episodes',
  labelNames: ['outcome'], // outcome: recovered/deferred/aborted
  registers: [register],
});

export const storeReconnectAttemptsTotal = new Counter({
  name: 'store_reconnect_attempts_total',
  help: 'Total number of failed attempts inside reconnection episodes',
  registers: [register],
});

export const storeReconnectInProgress = new Gauge({
  name: 'store_reconnect_in_progress',
  help: 'Number of reconnection episodes currently running',
  registers: [register],
});
