/**
 * Reference Data Routes (read-only, every role)
 *
 * Routes:
 *   GET    /areas      areas by code
 *   GET    /machines   machines by code, with their area id
 *
 * Requesters pick a machine or area from these when submitting.
 */

import { Router } from 'express';
import type { RequisitionStore } from '@stockroom/db';
import { Permission, requirePermission } from '@stockroom/auth-utils';
import { listAreas, listMachines } from '../services/reference-data.service.js';

export function createReferenceDataRouter(store: RequisitionStore): Router {
  const router = Router();
  const readReferenceData = requirePermission(Permission.REFERENCE_DATA_READ);

  router.get('/areas', readReferenceData, async (_req, res, next) => {
    try {
      res.json({ data: await listAreas(store) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/machines', readReferenceData, async (_req, res, next) => {
    try {
      res.json({ data: await listMachines(store) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
