import { describe, it, expect } from 'vitest';
import { parseLineItems } from '../services/line-items.ts';

const pollutants = [
  { id: 1, name: 'Water' },
  { id: 2, name: 'Sewage' },
  { id: 7, name: 'Garbage' },
];

describe('parseLineItems', () => {
  it('reads volume_{id} and cost_{id} for every known substance', () => {
    const { items, skipped } = parseLineItems(
      { volume_1: '12.5', cost_1: '100', volume_2: '3', cost_2: '', volume_9: '50', cost_9: '50' },
      pollutants,
    );
    expect([...items]).toEqual([
      [1, { volume: 12.5, cost: 100 }],
      [2, { volume: 3, cost: 0 }],
    ]);
    expect(skipped).toEqual([]);
  });

  it('stores nothing for an all-zero pair', () => {
    const { items } = parseLineItems({ volume_7: '0', cost_7: '0' }, pollutants);
    expect(items.has(7)).toBe(false);
    expect(items.size).toBe(0);
  });

  it('keeps a pair with cost only', () => {
    const { items } = parseLineItems({ cost_7: '45' }, pollutants);
    expect(items.get(7)).toEqual({ volume: 0, cost: 45 });
  });

  it('skips a substance whose amount does not parse and keeps the rest', () => {
    const { items, skipped } = parseLineItems(
      { volume_1: 'lots', cost_1: '10', volume_2: '4', cost_2: '-3', volume_7: '1', cost_7: '2' },
      pollutants,
    );
    expect([...items.keys()]).toEqual([7]);
    expect(skipped).toEqual([
      { pollutantId: 1, field: 'volume_1', value: 'lots' },
      { pollutantId: 2, field: 'cost_2', value: '-3' },
    ]);
  });

  it('accepts numeric JSON values and rejects negative ones', () => {
    const { items, skipped } = parseLineItems({ volume_1: 2, cost_1: 8, volume_2: -1 }, pollutants);
    expect(items.get(1)).toEqual({ volume: 2, cost: 8 });
    expect(skipped).toEqual([{ pollutantId: 2, field: 'volume_2', value: '-1' }]);
  });

  it('accepts exponent notation', () => {
    const { items } = parseLineItems({ volume_1: '1e3' }, pollutants);
    expect(items.get(1)).toEqual({ volume: 1000, cost: 0 });
  });
});
