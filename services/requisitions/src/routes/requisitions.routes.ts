/**
 * Requisition Routes
 *
 * Routes:
 *   POST   /                  submit a requisition (requester, administrator)
 *   GET    /mine              the caller's requisitions, newest first
 *   GET    /pending           approval queue, oldest first
 *   GET    /history           requisitions newest first (requesters: own only)
 *   GET    /history/export    history as CSV, one row per line (same scope)
 *   GET    /kpis              status counts, time to approval, top items
 *   GET    /:id               single requisition (requesters: own only)
 *   POST   /:id/decision      approve or reject
 */

import { Router, type Request } from 'express';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { z } from 'zod';
import type { RequisitionStore } from '@stockroom/db';
import { Permission, getAuditContext, hasPermission, requirePermission } from '@stockroom/auth-utils';
import { notFound } from '../middleware/error-handler.js';
import { currentUser } from '../middleware/current-user.js';
import {
  decideRequisition,
  defaultLifecycleOptions,
  submitRequisition,
  type LifecycleOptions,
} from '../services/requisition-lifecycle.service.js';
import { getRequisition, listByRequester, listHistory, listPending } from '../services/requisition-query.service.js';
import { computeRequisitionKpis } from '../services/requisition-kpi.service.js';
import {
  HISTORY_EXPORT_HEADERS,
  createCSVStream,
  generateExportFilename,
  toHistoryExportRows,
} from '../services/csv-export.service.js';

// ─── Schemas ──────────────────────────────────────────────────────────

const submitSchema = z.object({
  machineId: z.string().uuid().nullish(),
  areaId: z.string().uuid().nullish(),
  items: z
    .array(
      z.object({
        inventoryItemId: z.string().uuid(),
        qty: z.number(),
      }),
    )
    .max(200),
  note: z.string().max(2000).optional(),
});

const decisionSchema = z.object({
  decision: z.enum(['approve', 'reject']),
  approvedQuantities: z.record(z.string(), z.number()).optional(),
  comment: z.string().max(2000).optional(),
});

const limitQuerySchema = z.object({
  limit: z.coerce.number().optional(),
});

const idParamSchema = z.string().uuid();

function parseRequisitionId(raw: string): string {
  const parsed = idParamSchema.safeParse(raw);
  if (!parsed.success) throw notFound('Requisition', raw);
  return parsed.data;
}

/** Requesters see only their own history, as with single reads. */
function historyScope(req: Request): string | undefined {
  const user = currentUser(req);
  return hasPermission(user.role, Permission.REQUISITIONS_READ_ALL) ? undefined : user.sub;
}

// ─── Router ───────────────────────────────────────────────────────────

export function createRequisitionsRouter(
  store: RequisitionStore,
  lifecycle: LifecycleOptions = defaultLifecycleOptions(),
): Router {
  const router = Router();

  router.post('/', requirePermission(Permission.REQUISITIONS_CREATE), async (req, res, next) => {
    try {
      const user = currentUser(req);
      const body = submitSchema.parse(req.body);

      const requisition = await submitRequisition(
        store,
        {
          requesterId: user.sub,
          machineId: body.machineId,
          areaId: body.areaId,
          items: body.items,
          note: body.note,
          audit: getAuditContext(req),
        },
        lifecycle,
      );

      res.status(201).json({ data: requisition });
    } catch (error) {
      next(error);
    }
  });

  router.get('/mine', requirePermission(Permission.REQUISITIONS_READ_OWN), async (req, res, next) => {
    try {
      const user = currentUser(req);
      res.json({ data: await listByRequester(store, user.sub) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/pending', requirePermission(Permission.REQUISITIONS_READ_ALL), async (_req, res, next) => {
    try {
      res.json({ data: await listPending(store) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/history', requirePermission(Permission.REQUISITIONS_HISTORY_READ), async (req, res, next) => {
    try {
      const { limit } = limitQuerySchema.parse(req.query);
      res.json({ data: await listHistory(store, limit, historyScope(req)) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/history/export', requirePermission(Permission.REQUISITIONS_HISTORY_READ), async (req, res, next) => {
    try {
      const { limit } = limitQuerySchema.parse(req.query);
      const rows = toHistoryExportRows(await listHistory(store, limit, historyScope(req)));

      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="${generateExportFilename()}"`);
      res.setHeader('X-Export-Row-Count', String(rows.length));
      await pipeline(Readable.from(rows), createCSVStream([...HISTORY_EXPORT_HEADERS]), res);
    } catch (error) {
      next(error);
    }
  });

  router.get('/kpis', requirePermission(Permission.REQUISITIONS_REPORTS_READ), async (req, res, next) => {
    try {
      const { limit } = limitQuerySchema.parse(req.query);
      res.json({ data: computeRequisitionKpis(await listHistory(store, limit)) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', requirePermission(Permission.REQUISITIONS_READ_OWN), async (req, res, next) => {
    try {
      const user = currentUser(req);
      const id = parseRequisitionId(req.params.id);
      const requisition = await getRequisition(store, id);

      // Someone else's requisition looks the same as a missing one.
      if (!hasPermission(user.role, Permission.REQUISITIONS_READ_ALL) && requisition.requesterId !== user.sub) {
        throw notFound('Requisition', id);
      }

      res.json({ data: requisition });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/decision', requirePermission(Permission.REQUISITIONS_DECIDE), async (req, res, next) => {
    try {
      const user = currentUser(req);
      const requisitionId = parseRequisitionId(req.params.id);
      const body = decisionSchema.parse(req.body);

      const result = await decideRequisition(
        store,
        {
          requisitionId,
          approverId: user.sub,
          decision: body.decision,
          approvedQuantities: body.approvedQuantities,
          comment: body.comment,
          audit: getAuditContext(req),
        },
        lifecycle,
      );

      res.json({ data: result });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
