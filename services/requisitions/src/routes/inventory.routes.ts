/**
 * Inventory Routes
 *
 * Routes:
 *   GET    /   every item with its current stock, by SKU
 *   POST   /   create an item with its initial stock (administrator)
 */

import { Router } from 'express';
import { z } from 'zod';
import type { RequisitionStore } from '@stockroom/db';
import { Permission, getAuditContext, requirePermission } from '@stockroom/auth-utils';
import { currentUser } from '../middleware/current-user.js';
import { getInventory } from '../services/requisition-query.service.js';
import { createInventoryItem } from '../services/reference-data.service.js';

const createItemSchema = z.object({
  sku: z.string().trim().min(1).max(100),
  description: z.string().trim().min(1).max(500),
  stock: z.number().min(0),
  unit: z.string().trim().min(1).max(20).optional(),
});

export function createInventoryRouter(store: RequisitionStore): Router {
  const router = Router();

  router.get('/', requirePermission(Permission.INVENTORY_READ), async (_req, res, next) => {
    try {
      res.json({ data: await getInventory(store) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/', requirePermission(Permission.INVENTORY_CREATE), async (req, res, next) => {
    try {
      const user = currentUser(req);
      const body = createItemSchema.parse(req.body);
      const item = await createInventoryItem(store, body, { userId: user.sub, audit: getAuditContext(req) });
      res.status(201).json({ data: item });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
