/**
 * routes/analytics.ts — Fleet analytics
 *
 * GET /analytics             — Summary, breakdown and embedded charts
 * GET /analytics/volume.svg  — Volume-by-ship bar chart alone
 *
 * Both take `as_of` (YYYY-MM-DD, default today).
 */
import { Router, type Request, type Response, type NextFunction } from 'express';
import type { Database } from '../config/database.ts';
import { aggregateFleet } from '../services/aggregator.ts';
import { renderFleetCharts, renderVolumeBarChart, SVG_MIME, toDataUri } from '../services/charts.ts';
import { loadFleetSnapshot } from '../services/dal.ts';
import { parseCutoff } from '../services/filters.ts';
import type { AnalyticsPayload, FleetAggregate } from '../types.ts';

async function aggregateAsOf(db: Database, req: Request): Promise<FleetAggregate> {
  const { cutoff, dropped } = parseCutoff(req.query.as_of);
  if (dropped.length > 0) req.log?.debug({ dropped }, 'Ignored malformed analytics parameters');
  return aggregateFleet(await loadFleetSnapshot(db, cutoff), cutoff);
}

export function analyticsRouter(db: Database): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const aggregate = await aggregateAsOf(db, req);
      const charts = renderFleetCharts(aggregate.summary, aggregate.breakdown);

      const data: AnalyticsPayload = {
        ...aggregate,
        charts: {
          volumeByShip: toDataUri(charts.volumeByShip),
          costByShip: Object.fromEntries(
            [...charts.costByShip].map(([ship, svg]): [string, string] => [ship, toDataUri(svg)]),
          ),
        },
      };
      res.json({ success: true, data });
    } catch (err) { next(err); }
  });

  router.get('/volume.svg', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { summary } = await aggregateAsOf(db, req);
      const svg = renderVolumeBarChart(summary.map(s => s.shipName), summary.map(s => s.totalVolume));
      res.type(SVG_MIME).send(svg);
    } catch (err) { next(err); }
  });

  return router;
}
