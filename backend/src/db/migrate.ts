/**
 * db/migrate.ts — Apply schema.sql
 *
 * Statements are sent one at a time: the embedded driver runs each query
 * through the extended protocol, which takes a single statement.
 */
import { readFileSync } from 'fs';
import { sql } from 'drizzle-orm';
import type { Database } from '../config/database.ts';

const SCHEMA_FILE = new URL('./schema.sql', import.meta.url);

/** Split a DDL script on `;`, dropping `--` comment lines and blanks. */
export function splitStatements(script: string): string[] {
  return script
    .split('\n')
    .filter(line => !line.trim().startsWith('--'))
    .join('\n')
    .split(';')
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

export async function ensureSchema(db: Database): Promise<number> {
  const statements = splitStatements(readFileSync(SCHEMA_FILE, 'utf-8'));
  for (const statement of statements) {
    await db.execute(sql.raw(statement));
  }
  return statements.length;
}
