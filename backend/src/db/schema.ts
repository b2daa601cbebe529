/**
 * db/schema.ts — Drizzle ORM schema definitions
 *
 * Tables:
 *   ships                 — fleet vessels (lookup)
 *   ports                 — ports of call (lookup)
 *   contractors           — servicing contractors (lookup)
 *   pollutants            — substance types: water, sewage, sludge, garbage (lookup)
 *   operations            — one servicing event per row
 *   operation_pollutants  — per-substance volume/cost line items of an operation
 *
 * The DDL that creates these lives in schema.sql; keep both in step.
 */
import {
  pgTable, serial, integer, text, date, boolean, doublePrecision,
  index, uniqueIndex,
} from 'drizzle-orm/pg-core';

// ══════════════════════════════════════════════════════
// LOOKUP TABLES
// ══════════════════════════════════════════════════════

export const ships = pgTable('ships', {
  id: serial('id').primaryKey(),
  name: text('name').notNull().unique(),
});

export const ports = pgTable('ports', {
  id: serial('id').primaryKey(),
  name: text('name').notNull().unique(),
});

export const contractors = pgTable('contractors', {
  id: serial('id').primaryKey(),
  name: text('name').notNull().unique(),
});

export const pollutants = pgTable('pollutants', {
  id: serial('id').primaryKey(),
  name: text('name').notNull().unique(),
});

// ══════════════════════════════════════════════════════
// OPERATIONS
// ══════════════════════════════════════════════════════

export const operations = pgTable('operations', {
  id: serial('id').primaryKey(),
  shipId: integer('ship_id').notNull().references(() => ships.id, { onDelete: 'restrict' }),
  portId: integer('port_id').notNull().references(() => ports.id, { onDelete: 'restrict' }),
  contractorId: integer('contractor_id').notNull().references(() => contractors.id, { onDelete: 'restrict' }),
  date: date('date', { mode: 'string' }).notNull(),                 // "2025-03-14"
  hasDocuments: boolean('has_documents').notNull().default(false),
}, (table) => ({
  dateIdx: index('idx_operations_date').on(table.date),
  shipIdx: index('idx_operations_ship').on(table.shipId),
  portIdx: index('idx_operations_port').on(table.portId),
}));

export const operationPollutants = pgTable('operation_pollutants', {
  id: serial('id').primaryKey(),
  operationId: integer('operation_id').notNull().references(() => operations.id, { onDelete: 'cascade' }),
  pollutantId: integer('pollutant_id').notNull().references(() => pollutants.id, { onDelete: 'restrict' }),
  volume: doublePrecision('volume').notNull().default(0),          // cubic meters
  cost: doublePrecision('cost').notNull().default(0),
}, (table) => ({
  // One row per substance per operation
  operationPollutantIdx: uniqueIndex('idx_operation_pollutants_unique').on(table.operationId, table.pollutantId),
}));

// ── Type exports for use in services ──

export type Ship = typeof ships.$inferSelect;
export type Port = typeof ports.$inferSelect;
export type Contractor = typeof contractors.$inferSelect;
export type Pollutant = typeof pollutants.$inferSelect;
export type Operation = typeof operations.$inferSelect;
export type NewOperation = typeof operations.$inferInsert;
export type OperationPollutant = typeof operationPollutants.$inferSelect;
export type NewOperationPollutant = typeof operationPollutants.$inferInsert;
