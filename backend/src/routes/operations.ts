/**
 * routes/operations.ts — Operation list, detail and CRUD
 *
 * GET  /               — Filtered, sorted list with rolled-up costs
 * GET  /operation/:id  — Bare JSON detail
 * GET  /create         — Form model
 * POST /create         — Insert, 303 → /
 * GET  /edit/:id       — Form model + operation
 * POST /edit/:id       — Replace main fields and line items, 303 → /
 * POST /delete/:id     — Delete with line items, 303 → /
 *
 * Form bodies are urlencoded. Main fields are zod-validated; the
 * per-substance volume_{id}/cost_{id} fields go through parseLineItems.
 */
import { Router, type Request, type Response, type NextFunction } from 'express';
import type { Database } from '../config/database.ts';
import {
  createOperation, deleteOperation, getOperation, listLookups, listOperations,
  listPollutants, operationExists, updateOperation,
} from '../services/dal.ts';
import { echoFilters, parseOperationFilters } from '../services/filters.ts';
import { parseLineItems } from '../services/line-items.ts';
import { NotFoundError } from '../shared/errors.ts';
import { lineItemsSkipped, operationWrites } from '../shared/metrics.ts';
import { logger } from '../shared/logger.ts';
import { OperationCreateSchema, OperationEditSchema, parseIdParam, parseWith } from '../schemas.ts';
import type { OperationDetailPayload, OperationView } from '../types.ts';

function toListItem(op: OperationView) {
  return {
    ...op,
    pollutants: op.pollutants.map(p => ({ id: p.pollutantId, name: p.name, volume: p.volume, cost: p.cost })),
  };
}

function toDetail(op: OperationView): OperationDetailPayload {
  return {
    id: op.id,
    ship: op.ship.name,
    port: op.port.name,
    contractor: op.contractor.name,
    date: op.date,
    has_documents: op.hasDocuments,
    pollutants: op.pollutants.map(p => ({ name: p.name, volume: p.volume, cost: p.cost })),
    total_cost: op.totalCost,
  };
}

/** Substance amounts from the form body, with unparsable fields logged and counted. */
async function readLineItems(db: Database, req: Request, body: Readonly<Record<string, unknown>>) {
  const { items, skipped } = parseLineItems(body, await listPollutants(db));
  if (skipped.length > 0) {
    (req.log ?? logger).warn({ skipped }, `Skipped ${skipped.length} line item(s) with unparsable amounts`);
    lineItemsSkipped.inc(skipped.length);
  }
  return items;
}

export function operationsRouter(db: Database): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { ship_ids, start_date, end_date, port_id, sort_order } = req.query;
      const { filters, dropped } = parseOperationFilters({ ship_ids, start_date, end_date, port_id, sort_order });
      if (dropped.length > 0) req.log?.debug({ dropped }, 'Ignored malformed filter parameters');

      const operations = await listOperations(db, filters);
      const { ships, ports } = await listLookups(db);
      res.json({
        success: true,
        data: { operations: operations.map(toListItem), ships, ports, filters: echoFilters(filters) },
      });
    } catch (err) { next(err); }
  });

  router.get('/operation/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseIdParam(req.params);
      const op = id === null ? undefined : await getOperation(db, id);
      if (!op) {
        res.status(404).json({ detail: 'Operation not found' });
        return;
      }
      res.json(toDetail(op));
    } catch (err) { next(err); }
  });

  router.get('/create', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, data: await listLookups(db) });
    } catch (err) { next(err); }
  });

  router.post('/create', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const form = parseWith(OperationCreateSchema, req.body);
      const items = await readLineItems(db, req, form);
      const id = await createOperation(db, {
        shipId: form.ship_id,
        portId: form.port_id,
        contractorId: form.contractor_id,
        date: form.date,
        hasDocuments: false,
      }, items);
      operationWrites.inc({ kind: 'create' });
      req.log?.info({ operationId: id, lineItems: items.size }, 'Operation created');
      res.redirect(303, '/');
    } catch (err) { next(err); }
  });

  router.get('/edit/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseIdParam(req.params);
      const op = id === null ? undefined : await getOperation(db, id);
      if (!op) throw new NotFoundError();
      const lookups = await listLookups(db);
      res.json({ success: true, data: { ...lookups, operation: toListItem(op) } });
    } catch (err) { next(err); }
  });

  router.post('/edit/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseIdParam(req.params);
      if (id === null || !(await operationExists(db, id))) throw new NotFoundError();
      const form = parseWith(OperationEditSchema, req.body);
      const items = await readLineItems(db, req, form);
      await updateOperation(db, id, {
        shipId: form.ship_id,
        portId: form.port_id,
        contractorId: form.contractor_id,
        date: form.date,
        hasDocuments: form.has_documents,
      }, items);
      operationWrites.inc({ kind: 'update' });
      req.log?.info({ operationId: id, lineItems: items.size }, 'Operation updated');
      res.redirect(303, '/');
    } catch (err) { next(err); }
  });

  router.post('/delete/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseIdParam(req.params);
      if (id === null) throw new NotFoundError();
      await deleteOperation(db, id);
      operationWrites.inc({ kind: 'delete' });
      req.log?.info({ operationId: id }, 'Operation deleted');
      res.redirect(303, '/');
    } catch (err) { next(err); }
  });

  return router;
}
