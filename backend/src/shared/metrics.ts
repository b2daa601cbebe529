/**
 * shared/metrics.ts — Prometheus metrics via prom-client
 *
 * Exposes: GET /metrics
 *
 * Metrics:
 *   fleet_http_requests_total           — Counter by method/route/status
 *   fleet_http_request_duration_seconds — Histogram by method/route/status
 *   fleet_operation_writes_total        — Counter by kind (create/update/delete)
 *   fleet_line_items_skipped_total      — Counter of unparsable substance fields
 */
import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';
import type { Request, Response, NextFunction } from 'express';
import { errorMessage } from './errors.ts';

export const registry = new Registry();

collectDefaultMetrics({ register: registry, prefix: 'fleet_' });

// ── HTTP Metrics ──

export const httpRequestsTotal = new Counter({
  name: 'fleet_http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'route', 'status_code'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'fleet_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [registry],
});

// ── Domain Metrics ──

export const operationWrites = new Counter({
  name: 'fleet_operation_writes_total',
  help: 'Committed operation writes',
  labelNames: ['kind'] as const, // create, update, delete
  registers: [registry],
});

export const lineItemsSkipped = new Counter({
  name: 'fleet_line_items_skipped_total',
  help: 'Substance entries dropped because a volume or cost did not parse',
  registers: [registry],
});

// ── Express Middleware ──

/**
 * Route label for a request. Uses the matched route pattern so ids
 * do not explode label cardinality; unmatched paths collapse to one label.
 */
function routeLabel(req: Request): string {
  const pattern: unknown = req.route?.path;
  if (typeof pattern === 'string') return `${req.baseUrl}${pattern}` || '/';
  return 'unmatched';
}

export function metricsMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (req.path === '/metrics') return next();

    const end = httpRequestDuration.startTimer();
    res.on('finish', () => {
      const labels = { method: req.method, route: routeLabel(req), status_code: String(res.statusCode) };
      end(labels);
      httpRequestsTotal.inc(labels);
    });

    next();
  };
}

/**
 * Metrics endpoint handler. Returns Prometheus text format.
 */
export async function metricsEndpoint(_req: Request, res: Response): Promise<void> {
  try {
    res.set('Content-Type', registry.contentType);
    res.end(await registry.metrics());
  } catch (err) {
    res.status(500).end(`Error collecting metrics: ${errorMessage(err)}`);
  }
}
