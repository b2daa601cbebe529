/**
 * routes/health.ts — Health check endpoints
 *
 * GET /health         — Quick liveness check
 * GET /health/ready   — Readiness check (store ping + memory)
 */
import { Router, type Request, type Response } from 'express';
import type { DatabaseHandle } from '../config/database.ts';
import { errorMessage } from '../shared/errors.ts';

interface Check {
  status: 'ok' | 'error';
  latencyMs?: number;
  error?: string;
  details?: Record<string, number | string>;
}

const version = process.env.npm_package_version || '1.0.0';

export function healthRouter(store: DatabaseHandle): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: Math.round(process.uptime()),
      version,
    });
  });

  router.get('/ready', async (_req: Request, res: Response) => {
    const checks: Record<string, Check> = {};

    try {
      checks.database = { status: 'ok', latencyMs: await store.ping(), details: { driver: store.driver } };
    } catch (err) {
      checks.database = { status: 'error', error: errorMessage(err), details: { driver: store.driver } };
    }

    const mem = process.memoryUsage();
    checks.memory = {
      status: 'ok',
      details: {
        heapUsedMB: Math.round(mem.heapUsed / 1024 / 1024),
        heapTotalMB: Math.round(mem.heapTotal / 1024 / 1024),
        rssMB: Math.round(mem.rss / 1024 / 1024),
      },
    };

    const hasError = Object.values(checks).some(c => c.status === 'error');
    res.status(hasError ? 503 : 200).json({
      status: hasError ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      uptime: Math.round(process.uptime()),
      checks,
    });
  });

  return router;
}
