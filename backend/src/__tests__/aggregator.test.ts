import { describe, it, expect } from 'vitest';
import { aggregateFleet, FleetAgg } from '../services/aggregator.ts';
import type { FleetSnapshot } from '../types.ts';

const ships = [
  { id: 1, name: 'Vega' },
  { id: 2, name: 'Altair' },
  { id: 3, name: 'Castor' },
];
const pollutants = [
  { id: 1, name: 'Water' },
  { id: 2, name: 'Sewage' },
  { id: 3, name: 'Sludge' },
];

const snapshot: FleetSnapshot = {
  ships,
  pollutants,
  operations: [
    {
      id: 1, shipId: 1, date: '2025-01-10',
      lineItems: [
        { pollutantId: 1, volume: 10, cost: 100 },
        { pollutantId: 2, volume: 2, cost: 40 },
      ],
    },
    {
      id: 2, shipId: 1, date: '2025-03-05',
      lineItems: [
        { pollutantId: 1, volume: 5, cost: 60 },
        { pollutantId: 3, volume: 0, cost: 0 },
      ],
    },
    {
      id: 3, shipId: 2, date: '2025-02-01',
      lineItems: [{ pollutantId: 3, volume: 0, cost: 25 }],
    },
    {
      id: 4, shipId: 2, date: '2025-06-30',
      lineItems: [{ pollutantId: 1, volume: 8, cost: 80 }],
    },
  ],
};

describe('aggregateFleet', () => {
  const result = aggregateFleet(snapshot, '2025-03-31');

  it('lists every ship exactly once, ordered by name', () => {
    expect(result.summary.map(s => s.shipName)).toEqual(['Altair', 'Castor', 'Vega']);
  });

  it('gives a ship without operations zero stats', () => {
    expect(result.summary[1]).toEqual({
      shipId: 3, shipName: 'Castor', operationCount: 0, totalVolume: 0, totalCost: 0,
      substances: [], firstDate: null, lastDate: null,
    });
  });

  it('counts only operations on or before the cutoff', () => {
    expect(result.summary[0]).toEqual({
      shipId: 2, shipName: 'Altair', operationCount: 1, totalVolume: 0, totalCost: 25,
      substances: ['Sludge'], firstDate: '2025-02-01', lastDate: '2025-02-01',
    });
    expect(result.summary[2]).toEqual({
      shipId: 1, shipName: 'Vega', operationCount: 2, totalVolume: 17, totalCost: 200,
      substances: ['Sewage', 'Water'], firstDate: '2025-01-10', lastDate: '2025-03-05',
    });
  });

  it('breaks totals down by ship and substance, omitting all-zero pairs', () => {
    expect(result.breakdown).toEqual([
      { shipId: 2, shipName: 'Altair', pollutantId: 3, substance: 'Sludge', totalVolume: 0, totalCost: 25 },
      { shipId: 1, shipName: 'Vega', pollutantId: 2, substance: 'Sewage', totalVolume: 2, totalCost: 40 },
      { shipId: 1, shipName: 'Vega', pollutantId: 1, substance: 'Water', totalVolume: 15, totalCost: 160 },
    ]);
  });

  it('keeps each ship summary equal to the sum of its breakdown rows', () => {
    for (const ship of result.summary) {
      const rows = result.breakdown.filter(r => r.shipId === ship.shipId);
      expect(rows.reduce((s, r) => s + r.totalCost, 0)).toBe(ship.totalCost);
      expect(rows.reduce((s, r) => s + r.totalVolume, 0)).toBe(ship.totalVolume);
    }
  });

  it('includes operations dated exactly on the cutoff', () => {
    const later = aggregateFleet(snapshot, '2025-06-30');
    expect(later.summary[0]?.operationCount).toBe(2);
    expect(later.summary[0]?.totalCost).toBe(105);
  });

  it('returns zero stats for every ship when there are no operations', () => {
    const empty = aggregateFleet({ ships, pollutants, operations: [] }, '2025-03-31');
    expect(empty.breakdown).toEqual([]);
    expect(empty.summary.map(s => s.operationCount)).toEqual([0, 0, 0]);
    expect(empty.cutoff).toBe('2025-03-31');
  });
});

describe('FleetAgg', () => {
  it('ignores operations for unknown ships', () => {
    const agg = new FleetAgg(ships, pollutants, '2025-12-31');
    agg.add({ id: 9, shipId: 42, date: '2025-01-01', lineItems: [{ pollutantId: 1, volume: 1, cost: 1 }] });
    const { summary, breakdown } = agg.build();
    expect(summary.every(s => s.operationCount === 0)).toBe(true);
    expect(breakdown).toEqual([]);
  });
});
