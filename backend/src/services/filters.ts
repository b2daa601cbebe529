/**
 * filters.ts — Operation list filters
 *
 * Raw query parameters are loosely validated: anything that does not parse
 * is dropped (and reported in `dropped`) instead of failing the request.
 * The typed result is then turned into a Drizzle predicate and ordering.
 */
import { and, asc, desc, gte, inArray, lte, eq, type SQL } from 'drizzle-orm';
import { operations } from '../db/schema.ts';
import { firstString, isIsoDate, parsePositiveInt, toIsoDate } from './helpers.ts';
import type { DroppedFilter, FilterEcho, OperationFilters } from '../types.ts';

export interface RawOperationFilters {
  ship_ids?: unknown;
  start_date?: unknown;
  end_date?: unknown;
  port_id?: unknown;
  sort_order?: unknown;
}

export interface ParsedFilters {
  filters: OperationFilters;
  dropped: DroppedFilter[];
}

/** "1, 2,3" → [1, 2, 3]. One bad token voids the whole list. */
function parseShipIds(raw: string): number[] | null {
  const ids: number[] = [];
  for (const token of raw.split(',')) {
    const id = parsePositiveInt(token);
    if (id === null) return null;
    if (!ids.includes(id)) ids.push(id);
  }
  return ids;
}

export function parseOperationFilters(raw: RawOperationFilters): ParsedFilters {
  const dropped: DroppedFilter[] = [];
  const filters: OperationFilters = { sortOrder: 'desc' };

  const shipIds = firstString(raw.ship_ids)?.trim();
  if (shipIds) {
    const ids = parseShipIds(shipIds);
    if (ids) filters.shipIds = ids;
    else dropped.push({ param: 'ship_ids', value: shipIds, reason: 'every id must be a positive integer' });
  }

  for (const [param, key] of [['start_date', 'startDate'], ['end_date', 'endDate']] as const) {
    const value = firstString(raw[param])?.trim();
    if (!value) continue;
    if (isIsoDate(value)) filters[key] = value;
    else dropped.push({ param, value, reason: 'expected a YYYY-MM-DD calendar date' });
  }

  const portId = firstString(raw.port_id)?.trim();
  if (portId) {
    const id = parsePositiveInt(portId);
    if (id !== null) filters.portId = id;
    else if (portId !== '0') dropped.push({ param: 'port_id', value: portId, reason: 'expected a positive integer' });
  }

  const sortOrder = firstString(raw.sort_order);
  if (sortOrder?.trim().toLowerCase() === 'asc') filters.sortOrder = 'asc';

  return { filters, dropped };
}

export function buildOperationWhere(filters: OperationFilters): SQL | undefined {
  const conditions: SQL[] = [];
  if (filters.shipIds && filters.shipIds.length > 0) conditions.push(inArray(operations.shipId, filters.shipIds));
  if (filters.startDate) conditions.push(gte(operations.date, filters.startDate));
  if (filters.endDate) conditions.push(lte(operations.date, filters.endDate));
  if (filters.portId !== undefined) conditions.push(eq(operations.portId, filters.portId));
  return conditions.length > 0 ? and(...conditions) : undefined;
}

/** Date order, ties broken by id in the same direction. */
export function buildOperationOrder(filters: Pick<OperationFilters, 'sortOrder'>): SQL[] {
  const dir = filters.sortOrder === 'asc' ? asc : desc;
  return [dir(operations.date), dir(operations.id)];
}

export function echoFilters(filters: OperationFilters): FilterEcho {
  return {
    shipIds: filters.shipIds ?? [],
    startDate: filters.startDate ?? null,
    endDate: filters.endDate ?? null,
    portId: filters.portId ?? null,
    sortOrder: filters.sortOrder,
  };
}

/**
 * Analytics "as of" date. Absent or malformed → today.
 */
export function parseCutoff(raw: unknown, now: Date = new Date()): { cutoff: string; dropped: DroppedFilter[] } {
  const today = toIsoDate(now);
  const value = firstString(raw)?.trim();
  if (!value) return { cutoff: today, dropped: [] };
  if (isIsoDate(value)) return { cutoff: value, dropped: [] };
  return { cutoff: today, dropped: [{ param: 'as_of', value, reason: 'expected a YYYY-MM-DD calendar date' }] };
}
