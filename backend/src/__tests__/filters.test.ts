import { describe, it, expect } from 'vitest';
import { PgDialect } from 'drizzle-orm/pg-core';
import {
  buildOperationOrder, buildOperationWhere, echoFilters, parseCutoff, parseOperationFilters,
} from '../services/filters.ts';

describe('parseOperationFilters', () => {
  it('defaults to no constraints and descending order', () => {
    expect(parseOperationFilters({})).toEqual({ filters: { sortOrder: 'desc' }, dropped: [] });
  });

  it('parses a comma-separated ship list, trimming and collapsing duplicates', () => {
    const { filters, dropped } = parseOperationFilters({ ship_ids: ' 1, 2,3,2 ' });
    expect(filters.shipIds).toEqual([1, 2, 3]);
    expect(dropped).toEqual([]);
  });

  it('drops the whole ship filter when one token is not an id', () => {
    const { filters, dropped } = parseOperationFilters({ ship_ids: '1,x,3' });
    expect(filters.shipIds).toBeUndefined();
    expect(dropped).toEqual([
      { param: 'ship_ids', value: '1,x,3', reason: 'every id must be a positive integer' },
    ]);
  });

  it('drops ship and port ids beyond the integer column range', () => {
    const { filters, dropped } = parseOperationFilters({ ship_ids: '1,99999999999', port_id: '3000000000' });
    expect(filters).toEqual({ sortOrder: 'desc' });
    expect(dropped.map(d => d.param)).toEqual(['ship_ids', 'port_id']);
    expect(parseOperationFilters({ port_id: '2147483647' }).filters.portId).toBe(2147483647);
  });

  it('treats a blank ship list as absent', () => {
    expect(parseOperationFilters({ ship_ids: '  ' })).toEqual({ filters: { sortOrder: 'desc' }, dropped: [] });
  });

  it('keeps a well-formed date bound when its sibling is malformed', () => {
    const { filters, dropped } = parseOperationFilters({ start_date: 'bad', end_date: '2025-01-01' });
    expect(filters).toEqual({ sortOrder: 'desc', endDate: '2025-01-01' });
    expect(dropped.map(d => d.param)).toEqual(['start_date']);
  });

  it('rejects dates that do not exist on the calendar', () => {
    const { filters, dropped } = parseOperationFilters({ start_date: '2025-02-30', end_date: '2024-02-29' });
    expect(filters.startDate).toBeUndefined();
    expect(filters.endDate).toBe('2024-02-29');
    expect(dropped).toEqual([
      { param: 'start_date', value: '2025-02-30', reason: 'expected a YYYY-MM-DD calendar date' },
    ]);
  });

  it('ignores port 0 silently and reports other bad port ids', () => {
    expect(parseOperationFilters({ port_id: '0' })).toEqual({ filters: { sortOrder: 'desc' }, dropped: [] });

    const { filters, dropped } = parseOperationFilters({ port_id: 'pier' });
    expect(filters.portId).toBeUndefined();
    expect(dropped).toEqual([{ param: 'port_id', value: 'pier', reason: 'expected a positive integer' }]);

    expect(parseOperationFilters({ port_id: '2' }).filters.portId).toBe(2);
  });

  it('sorts ascending only for "asc", case-insensitively', () => {
    expect(parseOperationFilters({ sort_order: 'ASC' }).filters.sortOrder).toBe('asc');
    expect(parseOperationFilters({ sort_order: 'desc' }).filters.sortOrder).toBe('desc');
    expect(parseOperationFilters({ sort_order: 'sideways' }).filters.sortOrder).toBe('desc');
  });

  it('uses the first value of a repeated parameter', () => {
    expect(parseOperationFilters({ port_id: ['2', '1'] }).filters.portId).toBe(2);
  });
});

describe('buildOperationWhere', () => {
  const dialect = new PgDialect();

  it('returns undefined without constraints', () => {
    expect(buildOperationWhere({ sortOrder: 'desc' })).toBeUndefined();
  });

  it('binds every constraint as a parameter, in order', () => {
    const where = buildOperationWhere({
      shipIds: [1, 3], startDate: '2025-01-01', endDate: '2025-03-31', portId: 2, sortOrder: 'asc',
    });
    expect(where).toBeDefined();
    if (!where) return;
    expect(dialect.sqlToQuery(where).params).toEqual([1, 3, '2025-01-01', '2025-03-31', 2]);
  });
});

describe('buildOperationOrder', () => {
  it('orders by date then id', () => {
    expect(buildOperationOrder({ sortOrder: 'asc' })).toHaveLength(2);
  });
});

describe('echoFilters', () => {
  it('fills absent filters with null or an empty list', () => {
    expect(echoFilters({ sortOrder: 'desc', portId: 1 })).toEqual({
      shipIds: [], startDate: null, endDate: null, portId: 1, sortOrder: 'desc',
    });
  });
});

describe('parseCutoff', () => {
  const now = new Date(2025, 5, 15, 12, 0, 0);

  it('defaults to the local date of "now"', () => {
    expect(parseCutoff(undefined, now)).toEqual({ cutoff: '2025-06-15', dropped: [] });
  });

  it('accepts a calendar date', () => {
    expect(parseCutoff('2024-12-31', now)).toEqual({ cutoff: '2024-12-31', dropped: [] });
  });

  it('falls back to today for a malformed value', () => {
    expect(parseCutoff('31/12/2024', now)).toEqual({
      cutoff: '2025-06-15',
      dropped: [{ param: 'as_of', value: '31/12/2024', reason: 'expected a YYYY-MM-DD calendar date' }],
    });
  });
});
