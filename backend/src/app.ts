/**
 * app.ts — Express application factory
 *
 * The store handle is built by the caller (server.ts, or a test) and
 * injected here; every router receives it explicitly.
 */
import express, { type ErrorRequestHandler, type Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import { randomUUID } from 'crypto';
import { env } from './config/env.ts';
import type { DatabaseHandle } from './config/database.ts';
import { operationsRouter } from './routes/operations.ts';
import { analyticsRouter } from './routes/analytics.ts';
import { healthRouter } from './routes/health.ts';
import { logger, requestLogger } from './shared/logger.ts';
import { metricsMiddleware, metricsEndpoint } from './shared/metrics.ts';
import { AppError, ValidationError, errorMessage } from './shared/errors.ts';

export interface AppOptions {
  store: DatabaseHandle;
}

function allowedOrigins(raw: string): string[] {
  return raw.split(',').map(s => s.trim()).filter(Boolean);
}

/** Status carried by a non-AppError (body-parser sets one on malformed bodies). */
function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 600 ? err.status : 500;
  }
  return 500;
}

const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (err instanceof AppError) {
    res.status(err.status).json({
      success: false,
      error: err.message,
      code: err.code,
      ...(err instanceof ValidationError ? { details: err.details } : {}),
    });
    return;
  }

  const status = statusOf(err);
  const requestId = req.id || randomUUID().slice(0, 8);
  const log = req.log ?? logger;
  if (status >= 500) log.error({ err, method: req.method, url: req.originalUrl }, `Unhandled error [${requestId}]`);
  else log.warn({ err, method: req.method, url: req.originalUrl }, `Rejected request [${requestId}]`);

  res.status(status).json({
    success: false,
    error: env.NODE_ENV === 'production' && status >= 500 ? 'Internal server error' : errorMessage(err),
    requestId,
  });
};

export function createApp({ store }: AppOptions): Express {
  const app = express();
  app.set('trust proxy', 1);

  // ─── Security & Performance ───

  const origins = allowedOrigins(env.ALLOWED_ORIGINS);
  app.use(cors({
    origin: origins.includes('*') ? true : origins,
    credentials: true,
  }));

  app.use(compression({ threshold: 1024 }));
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));
  app.use(express.json({ limit: '100kb' }));

  // ─── Prometheus metrics (early — measures everything) ───

  app.use(metricsMiddleware());

  // ─── Structured request logging (Pino) ───

  app.use(requestLogger());

  // ─── Security headers ───

  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    if (env.NODE_ENV === 'production') {
      res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    next();
  });

  // ─── Routes ───

  app.get('/metrics', metricsEndpoint);
  app.use('/health', healthRouter(store));
  app.use('/analytics', analyticsRouter(store.db));
  app.use('/', operationsRouter(store.db));

  app.use((_req, res) => {
    res.status(404).json({ success: false, error: 'Not found', code: 'NOT_FOUND' });
  });

  app.use(errorHandler);

  return app;
}
