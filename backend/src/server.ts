/**
 * server.ts — Process entry point
 *
 * Bootstrap order:
 *   1. open the store (DB_DRIVER=pglite → embedded, pg → PostgreSQL pool)
 *   2. apply schema.sql (idempotent)
 *   3. seed empty lookup tables
 *   4. build the Express app around the store handle and listen
 */
import type { Server } from 'http';
import { env } from './config/env.ts';
import { createDatabase, type DatabaseHandle } from './config/database.ts';
import { ensureSchema } from './db/migrate.ts';
import { seedLookups } from './db/seed.ts';
import { createApp } from './app.ts';
import { logger } from './shared/logger.ts';

const BOOT_TIME = Date.now();

let store: DatabaseHandle | undefined;
let server: Server | undefined;
let shuttingDown = false;

// ─── Graceful shutdown ───

async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, 'Shutting down...');

  setTimeout(() => { logger.warn('Forced exit (10s timeout)'); process.exit(1); }, 10000).unref();

  const httpServer = server;
  if (httpServer) {
    await new Promise<void>((resolve) => {
      httpServer.close((err) => {
        if (err) logger.warn({ err }, 'HTTP server close error');
        else logger.info('HTTP server closed');
        resolve();
      });
    });
  }

  try {
    await store?.close();
  } catch (err) {
    logger.warn({ err }, 'Cleanup error');
  }
  process.exit(0);
}

function onSignal(signal: NodeJS.Signals): void {
  gracefulShutdown(signal).catch((err: unknown) => {
    logger.error({ err }, 'Shutdown failed');
    process.exit(1);
  });
}

process.on('SIGTERM', onSignal);
process.on('SIGINT', onSignal);
process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled rejection');
});
process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception');
  setTimeout(() => process.exit(1), 1000).unref();
});

// ─── Start ───

async function start(): Promise<void> {
  store = createDatabase(env);
  const latencyMs = await store.ping();
  logger.info({ driver: store.driver, latencyMs }, 'Store connected');

  const statements = await ensureSchema(store.db);
  logger.info({ statements }, 'Schema ensured');
  await seedLookups(store.db);

  const app = createApp({ store });
  server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, env: env.NODE_ENV, bootMs: Date.now() - BOOT_TIME }, 'Server started');
  });
}

start().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  process.exit(1);
});
