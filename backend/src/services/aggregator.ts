/**
 * aggregator.ts — Fleet aggregation engine
 *
 * Single pass over the operations on or before a cutoff date, bucketed by
 * ship and by ship × substance. Both outputs come from the same buckets:
 *   summary   — one row per ship, ships without operations included
 *   breakdown — one row per (ship, substance) with a non-zero line item
 * A ship's summary totals are the sums of its breakdown rows.
 */
import { byName } from './helpers.ts';
import type {
  BreakdownRow, FleetAggregate, FleetOperation, FleetSnapshot, Lookup, ShipSummary,
} from '../types.ts';

interface PairBucket { volume: number; cost: number }
interface ShipBucket { n: number; first: string | null; last: string | null; byPollutant: Map<number, PairBucket> }

export class FleetAgg {
  readonly cutoff: string;
  private readonly ships: Lookup[];
  private readonly pollutantNames: Map<number, string>;
  private readonly byShip = new Map<number, ShipBucket>();

  constructor(ships: readonly Lookup[], pollutants: readonly Lookup[], cutoff: string) {
    this.cutoff = cutoff;
    this.ships = [...ships].sort(byName);
    this.pollutantNames = new Map(pollutants.map(p => [p.id, p.name]));
    for (const ship of this.ships) {
      this.byShip.set(ship.id, { n: 0, first: null, last: null, byPollutant: new Map() });
    }
  }

  add(op: FleetOperation): void {
    if (op.date > this.cutoff) return;
    const sb = this.byShip.get(op.shipId);
    if (!sb) return;

    sb.n++;
    if (sb.first === null || op.date < sb.first) sb.first = op.date;
    if (sb.last === null || op.date > sb.last) sb.last = op.date;

    for (const item of op.lineItems) {
      if (item.volume <= 0 && item.cost <= 0) continue;
      if (!this.pollutantNames.has(item.pollutantId)) continue;
      let pb = sb.byPollutant.get(item.pollutantId);
      if (!pb) {
        pb = { volume: 0, cost: 0 };
        sb.byPollutant.set(item.pollutantId, pb);
      }
      pb.volume += item.volume;
      pb.cost += item.cost;
    }
  }

  build(): FleetAggregate {
    const summary: ShipSummary[] = [];
    const breakdown: BreakdownRow[] = [];

    for (const ship of this.ships) {
      const sb = this.byShip.get(ship.id);
      if (!sb) continue;

      const rows: BreakdownRow[] = [...sb.byPollutant.entries()]
        .map(([pollutantId, pb]) => ({
          shipId: ship.id,
          shipName: ship.name,
          pollutantId,
          substance: this.pollutantNames.get(pollutantId) ?? '',
          totalVolume: pb.volume,
          totalCost: pb.cost,
        }))
        .sort((a, b) => a.substance.localeCompare(b.substance));

      summary.push({
        shipId: ship.id,
        shipName: ship.name,
        operationCount: sb.n,
        totalVolume: rows.reduce((s, r) => s + r.totalVolume, 0),
        totalCost: rows.reduce((s, r) => s + r.totalCost, 0),
        substances: rows.map(r => r.substance),
        firstDate: sb.first,
        lastDate: sb.last,
      });
      breakdown.push(...rows);
    }

    return { cutoff: this.cutoff, summary, breakdown };
  }
}

/**
 * Per-ship summary and ship × substance breakdown as of `cutoff` (inclusive).
 */
export function aggregateFleet(snapshot: FleetSnapshot, cutoff: string): FleetAggregate {
  const agg = new FleetAgg(snapshot.ships, snapshot.pollutants, cutoff);
  for (const op of snapshot.operations) agg.add(op);
  return agg.build();
}
