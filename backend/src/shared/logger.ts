/**
 * shared/logger.ts — Structured logging via Pino
 *
 * Development: pino-pretty (colorized, human-readable)
 * Production:  JSON lines
 * Test:        silent
 *
 * Request logging middleware assigns a request id, attaches a child
 * logger to req.log and writes one line per completed request.
 */
import pino, { type Logger } from 'pino';
import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { env } from '../config/env.ts';

declare global {
  namespace Express {
    interface Request {
      id?: string;
      log?: Logger;
    }
  }
}

export const logger = pino({
  level: env.NODE_ENV === 'test' ? 'silent' : env.LOG_LEVEL,
  transport: env.NODE_ENV === 'development'
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' } }
    : undefined,
  base: {
    service: 'fleet-api',
    version: process.env.npm_package_version || '1.0.0',
    env: env.NODE_ENV,
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
  redact: {
    paths: ['req.headers.authorization', 'req.headers.cookie'],
    censor: '[REDACTED]',
  },
});

/**
 * Express middleware: logs every request with duration and status.
 * Honors an incoming X-Request-Id, otherwise generates a short one.
 */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = Date.now();
    const incoming = req.headers['x-request-id'];
    const reqId = typeof incoming === 'string' && incoming ? incoming : randomUUID().slice(0, 8);

    const log = logger.child({ reqId });
    req.id = reqId;
    req.log = log;
    res.setHeader('X-Request-Id', reqId);

    res.on('finish', () => {
      const duration = Date.now() - start;
      const line = {
        req: { method: req.method, url: req.originalUrl, ip: req.ip },
        res: { statusCode: res.statusCode },
        duration,
      };
      const msg = `${req.method} ${req.originalUrl} ${res.statusCode} ${duration}ms`;
      if (res.statusCode >= 500) log.error(line, msg);
      else if (res.statusCode >= 400) log.warn(line, msg);
      else log.info(line, msg);
    });

    next();
  };
}

/**
 * Create a child logger with additional context.
 * Usage: const log = childLogger({ module: 'seed' });
 */
export function childLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
