/**
 * db/seed.ts — Seed lookup tables on first startup
 *
 * Reads the fixed ship/port/contractor/substance names from data/seed.json
 * and inserts each list into its table only when that table is empty.
 *
 * Called explicitly by server.ts before it starts listening.
 * Can also run standalone: npx tsx backend/src/db/seed.ts
 *
 * Safe to run multiple times — non-empty tables are left untouched.
 */
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { count } from 'drizzle-orm';
import type { PgTable } from 'drizzle-orm/pg-core';
import { z } from 'zod';
import { createDatabase, type Database } from '../config/database.ts';
import { env } from '../config/env.ts';
import { childLogger } from '../shared/logger.ts';
import { ensureSchema } from './migrate.ts';
import { ships, ports, contractors, pollutants } from './schema.ts';

const log = childLogger({ module: 'seed' });

const SEED_FILE = new URL('../../data/seed.json', import.meta.url);

const nameList = z.array(z.string().trim().min(1)).refine(
  names => new Set(names).size === names.length,
  'Names must be unique',
);

export const SeedSchema = z.object({
  ships: nameList,
  ports: nameList,
  contractors: nameList,
  pollutants: nameList,
});

export type SeedData = z.infer<typeof SeedSchema>;
export type SeedResult = Record<keyof SeedData, number>;

export function loadSeedFile(path: URL | string = SEED_FILE): SeedData {
  return SeedSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}

async function countRows(db: Database, table: PgTable): Promise<number> {
  const rows = await db.select({ n: count() }).from(table);
  return rows[0]?.n ?? 0;
}

async function seedIfEmpty(
  db: Database,
  table: PgTable,
  names: string[],
  insert: (values: { name: string }[]) => Promise<unknown>,
): Promise<number> {
  if (names.length === 0 || (await countRows(db, table)) > 0) return 0;
  await insert(names.map(name => ({ name })));
  return names.length;
}

/**
 * Insert the seed set into every empty lookup table.
 * Runs in one transaction: either every empty table gets its rows or none does.
 * Returns the number of rows inserted per table.
 */
export async function seedLookups(db: Database, seed: SeedData = loadSeedFile()): Promise<SeedResult> {
  const result = await db.transaction(async (tx) => ({
    ships: await seedIfEmpty(tx, ships, seed.ships, v => tx.insert(ships).values(v)),
    ports: await seedIfEmpty(tx, ports, seed.ports, v => tx.insert(ports).values(v)),
    contractors: await seedIfEmpty(tx, contractors, seed.contractors, v => tx.insert(contractors).values(v)),
    pollutants: await seedIfEmpty(tx, pollutants, seed.pollutants, v => tx.insert(pollutants).values(v)),
  }));

  log.info(result, 'Lookup seed complete');
  return result;
}

// ── Standalone ──

async function main(): Promise<void> {
  const handle = createDatabase(env);
  try {
    await ensureSchema(handle.db);
    await seedLookups(handle.db);
  } finally {
    await handle.close();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((err: unknown) => {
    log.fatal({ err }, 'Seed failed');
    process.exit(1);
  });
}
