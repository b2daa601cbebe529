/**
 * config/database.ts — Store connection via Drizzle ORM
 *
 * Two drivers behind one typed Drizzle handle:
 *   pg     — node-postgres Pool against a PostgreSQL server
 *   pglite — embedded PostgreSQL persisted to a local directory
 *            (or held in memory when no directory is given, as in tests)
 *
 * The handle is constructed once by the caller and passed down explicitly.
 */
import { mkdirSync } from 'fs';
import { drizzle as drizzlePg } from 'drizzle-orm/node-postgres';
import { drizzle as drizzlePglite } from 'drizzle-orm/pglite';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { PGlite } from '@electric-sql/pglite';
import pg from 'pg';
import type { Env } from './env.ts';
import { childLogger } from '../shared/logger.ts';
import * as schema from '../db/schema.ts';

const { Pool } = pg;
const log = childLogger({ module: 'db' });

export type Schema = typeof schema;
export type Database = PgDatabase<PgQueryResultHKT, Schema>;

export interface DatabaseHandle {
  db: Database;
  driver: Env['DB_DRIVER'];
  /** Round-trip a trivial query. Returns latency in ms or throws. */
  ping(): Promise<number>;
  /** Release every connection. Call on shutdown. */
  close(): Promise<void>;
}

export type DatabaseConfig = Pick<
  Env,
  'DB_DRIVER' | 'DATABASE_URL' | 'DB_POOL_MIN' | 'DB_POOL_MAX' | 'DB_SSL' | 'PGLITE_DATA_DIR'
>;

export function createDatabase(config: DatabaseConfig): DatabaseHandle {
  if (config.DB_DRIVER === 'pg') return createPgDatabase(config);
  mkdirSync(config.PGLITE_DATA_DIR, { recursive: true });
  return createPgliteDatabase(config.PGLITE_DATA_DIR);
}

function createPgDatabase(config: DatabaseConfig): DatabaseHandle {
  const pool = new Pool({
    connectionString: config.DATABASE_URL,
    min: config.DB_POOL_MIN,
    max: config.DB_POOL_MAX,
    ssl: config.DB_SSL ? { rejectUnauthorized: false } : false,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  pool.on('error', (err) => {
    log.error({ err }, 'Unexpected pool error');
  });

  return {
    db: drizzlePg(pool, { schema }),
    driver: 'pg',
    async ping() {
      const start = Date.now();
      const client = await pool.connect();
      try {
        await client.query('SELECT 1');
        return Date.now() - start;
      } finally {
        client.release();
      }
    },
    async close() {
      await pool.end();
      log.info('Connection pool closed');
    },
  };
}

/**
 * Embedded store. Without a data directory the database lives in memory.
 */
export function createPgliteDatabase(dataDir?: string): DatabaseHandle {
  const client = dataDir ? new PGlite(dataDir) : new PGlite();

  return {
    db: drizzlePglite(client, { schema }),
    driver: 'pglite',
    async ping() {
      const start = Date.now();
      await client.query('SELECT 1');
      return Date.now() - start;
    },
    async close() {
      await client.close();
      log.info('Embedded store closed');
    },
  };
}
