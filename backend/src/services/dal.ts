/**
 * services/dal.ts — Data Access Layer
 *
 * Every read and write against the store goes through here. The database
 * handle is always passed in; nothing in this module holds a connection.
 *
 * Writes run in one transaction each: an operation row and its line items
 * are replaced together or not at all. Multi-query reads run in a
 * repeatable-read, read-only transaction so they see a single snapshot.
 */
import { asc, eq, inArray, lte } from 'drizzle-orm';
import type { Database } from '../config/database.ts';
import {
  ships, ports, contractors, pollutants, operations, operationPollutants,
} from '../db/schema.ts';
import { NotFoundError } from '../shared/errors.ts';
import { buildOperationOrder, buildOperationWhere } from './filters.ts';
import { rollupCost } from './rollup.ts';
import type {
  FleetOperation, FleetSnapshot, LineItem, LineItemMap, Lookup, LookupSet,
  OperationFilters, OperationInput, OperationView,
} from '../types.ts';

function readSnapshot<T>(db: Database, fn: (tx: Database) => Promise<T>): Promise<T> {
  return db.transaction(fn, { isolationLevel: 'repeatable read', accessMode: 'read only' });
}

// ══════════════════════════════════════════════════════
// LOOKUPS
// ══════════════════════════════════════════════════════

export async function listLookups(db: Database): Promise<LookupSet> {
  const [shipRows, portRows, contractorRows, pollutantRows] = await Promise.all([
    db.select().from(ships).orderBy(asc(ships.name)),
    db.select().from(ports).orderBy(asc(ports.name)),
    db.select().from(contractors).orderBy(asc(contractors.name)),
    db.select().from(pollutants).orderBy(asc(pollutants.id)),
  ]);
  return { ships: shipRows, ports: portRows, contractors: contractorRows, pollutants: pollutantRows };
}

export async function listPollutants(db: Database): Promise<Lookup[]> {
  return db.select().from(pollutants).orderBy(asc(pollutants.id));
}

// ══════════════════════════════════════════════════════
// OPERATION READS
// ══════════════════════════════════════════════════════

const operationColumns = {
  id: operations.id,
  date: operations.date,
  hasDocuments: operations.hasDocuments,
  shipId: ships.id,
  shipName: ships.name,
  portId: ports.id,
  portName: ports.name,
  contractorId: contractors.id,
  contractorName: contractors.name,
};

function selectOperations(db: Database) {
  return db.select(operationColumns)
    .from(operations)
    .innerJoin(ships, eq(operations.shipId, ships.id))
    .innerJoin(ports, eq(operations.portId, ports.id))
    .innerJoin(contractors, eq(operations.contractorId, contractors.id));
}

interface OperationRow {
  id: number;
  date: string;
  hasDocuments: boolean;
  shipId: number;
  shipName: string;
  portId: number;
  portName: string;
  contractorId: number;
  contractorName: string;
}

/**
 * Line items for a set of operations, keyed by operation id, each list
 * ordered by substance name.
 */
async function loadLineItems(db: Database, operationIds: number[]): Promise<Map<number, LineItem[]>> {
  const byOperation = new Map<number, LineItem[]>();
  if (operationIds.length === 0) return byOperation;

  const rows = await db.select({
    operationId: operationPollutants.operationId,
    pollutantId: operationPollutants.pollutantId,
    name: pollutants.name,
    volume: operationPollutants.volume,
    cost: operationPollutants.cost,
  })
    .from(operationPollutants)
    .innerJoin(pollutants, eq(operationPollutants.pollutantId, pollutants.id))
    .where(inArray(operationPollutants.operationId, operationIds))
    .orderBy(asc(pollutants.name));

  for (const { operationId, ...item } of rows) {
    const list = byOperation.get(operationId) ?? [];
    list.push(item);
    byOperation.set(operationId, list);
  }
  return byOperation;
}

function toView(row: OperationRow, lineItems: LineItem[]): OperationView {
  return {
    id: row.id,
    ship: { id: row.shipId, name: row.shipName },
    port: { id: row.portId, name: row.portName },
    contractor: { id: row.contractorId, name: row.contractorName },
    date: row.date,
    hasDocuments: row.hasDocuments,
    pollutants: lineItems,
    totalCost: rollupCost(lineItems),
  };
}

/**
 * Filtered, sorted operation list with rolled-up costs.
 */
export async function listOperations(db: Database, filters: OperationFilters): Promise<OperationView[]> {
  return readSnapshot(db, async (tx) => {
    const rows = await selectOperations(tx)
      .where(buildOperationWhere(filters))
      .orderBy(...buildOperationOrder(filters));
    const items = await loadLineItems(tx, rows.map(r => r.id));
    return rows.map(r => toView(r, items.get(r.id) ?? []));
  });
}

/**
 * Single operation with line items, or undefined when the id is unknown.
 */
export async function getOperation(db: Database, id: number): Promise<OperationView | undefined> {
  return readSnapshot(db, async (tx) => {
    const [row] = await selectOperations(tx).where(eq(operations.id, id)).limit(1);
    if (!row) return undefined;
    const items = await loadLineItems(tx, [row.id]);
    return toView(row, items.get(row.id) ?? []);
  });
}

export async function operationExists(db: Database, id: number): Promise<boolean> {
  const rows = await db.select({ id: operations.id }).from(operations).where(eq(operations.id, id)).limit(1);
  return rows.length > 0;
}

// ══════════════════════════════════════════════════════
// OPERATION WRITES
// ══════════════════════════════════════════════════════

async function insertLineItems(tx: Database, operationId: number, items: LineItemMap): Promise<void> {
  if (items.size === 0) return;
  await tx.insert(operationPollutants).values(
    [...items.entries()].map(([pollutantId, { volume, cost }]) => ({ operationId, pollutantId, volume, cost })),
  );
}

/**
 * Insert an operation and its line items. Returns the new id.
 * Unknown ship/port/contractor/substance ids fail the whole transaction.
 */
export async function createOperation(db: Database, input: OperationInput, items: LineItemMap): Promise<number> {
  return db.transaction(async (tx) => {
    const [created] = await tx.insert(operations).values(input).returning({ id: operations.id });
    if (!created) throw new Error('Insert returned no row');
    await insertLineItems(tx, created.id, items);
    return created.id;
  });
}

/**
 * Overwrite the main fields and replace the full line-item set.
 */
export async function updateOperation(db: Database, id: number, input: OperationInput, items: LineItemMap): Promise<void> {
  await db.transaction(async (tx) => {
    const updated = await tx.update(operations)
      .set(input)
      .where(eq(operations.id, id))
      .returning({ id: operations.id });
    if (updated.length === 0) throw new NotFoundError();

    await tx.delete(operationPollutants).where(eq(operationPollutants.operationId, id));
    await insertLineItems(tx, id, items);
  });
}

/**
 * Delete an operation. Its line items go with it (ON DELETE CASCADE).
 */
export async function deleteOperation(db: Database, id: number): Promise<void> {
  const deleted = await db.delete(operations).where(eq(operations.id, id)).returning({ id: operations.id });
  if (deleted.length === 0) throw new NotFoundError();
}

// ══════════════════════════════════════════════════════
// ANALYTICS
// ══════════════════════════════════════════════════════

/**
 * Every ship and substance, plus every operation dated on or before
 * `cutoff` with its line items, read from one snapshot.
 */
export async function loadFleetSnapshot(db: Database, cutoff: string): Promise<FleetSnapshot> {
  return readSnapshot(db, async (tx) => {
    // Sequential: a transaction runs on a single connection.
    const shipRows = await tx.select().from(ships).orderBy(asc(ships.name));
    const pollutantRows = await tx.select().from(pollutants).orderBy(asc(pollutants.name));
    const opRows = await tx.select({ id: operations.id, shipId: operations.shipId, date: operations.date })
      .from(operations)
      .where(lte(operations.date, cutoff))
      .orderBy(asc(operations.date), asc(operations.id));
    const itemRows = await tx.select({
      operationId: operationPollutants.operationId,
      pollutantId: operationPollutants.pollutantId,
      volume: operationPollutants.volume,
      cost: operationPollutants.cost,
    })
      .from(operationPollutants)
      .innerJoin(operations, eq(operationPollutants.operationId, operations.id))
      .where(lte(operations.date, cutoff));

    const fleetOps = new Map<number, FleetOperation>(
      opRows.map((op): [number, FleetOperation] => [op.id, { ...op, lineItems: [] }]),
    );
    for (const { operationId, ...item } of itemRows) {
      fleetOps.get(operationId)?.lineItems.push(item);
    }

    return { ships: shipRows, pollutants: pollutantRows, operations: [...fleetOps.values()] };
  });
}
