/**
 * Administration Routes (administrator only)
 *
 * Routes:
 *   POST   /areas
 *   POST   /machines
 *   GET    /users          POST /users
 *   PATCH  /users/:id      full name, role or password
 *   GET    /audit/verify   recompute the audit hash chain
 */

import { Router, type Request } from 'express';
import { z } from 'zod';
import type { RequisitionStore } from '@stockroom/db';
import { Permission, getAuditContext, requirePermission } from '@stockroom/auth-utils';
import { USER_ROLES } from '@stockroom/shared-types';
import { createLogger } from '@stockroom/config';
import { notFound } from '../middleware/error-handler.js';
import { currentUser } from '../middleware/current-user.js';
import {
  createArea,
  createMachine,
  createUser,
  listUsers,
  updateUser,
  type Actor,
} from '../services/reference-data.service.js';

const log = createLogger('requisitions:admin');

// ─── Schemas ──────────────────────────────────────────────────────────

const codeSchema = z.string().trim().min(1).max(50);
const nameSchema = z.string().trim().min(1).max(200);
const passwordSchema = z.string().min(8).max(200);

const areaSchema = z.object({ code: codeSchema, name: nameSchema });

const machineSchema = z.object({
  code: codeSchema,
  name: nameSchema,
  areaId: z.string().uuid().nullish(),
});

const createUserSchema = z.object({
  username: z.string().trim().min(1).max(100),
  fullName: nameSchema,
  password: passwordSchema,
  role: z.enum(USER_ROLES),
});

const updateUserSchema = z
  .object({
    fullName: nameSchema.optional(),
    password: passwordSchema.optional(),
    role: z.enum(USER_ROLES).optional(),
  })
  .refine((patch) => Object.values(patch).some((value) => value !== undefined), {
    message: 'At least one field must be provided',
  });

function actorOf(req: Request): Actor {
  return { userId: currentUser(req).sub, audit: getAuditContext(req) };
}

// ─── Router ───────────────────────────────────────────────────────────

export function createAdminRouter(store: RequisitionStore): Router {
  const router = Router();
  const manageReferenceData = requirePermission(Permission.REFERENCE_DATA_MANAGE);
  const manageUsers = requirePermission(Permission.AUTH_USERS_MANAGE);

  router.post('/areas', manageReferenceData, async (req, res, next) => {
    try {
      const body = areaSchema.parse(req.body);
      res.status(201).json({ data: await createArea(store, body, actorOf(req)) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/machines', manageReferenceData, async (req, res, next) => {
    try {
      const body = machineSchema.parse(req.body);
      res.status(201).json({ data: await createMachine(store, body, actorOf(req)) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/users', manageUsers, async (_req, res, next) => {
    try {
      res.json({ data: await listUsers(store) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/users', manageUsers, async (req, res, next) => {
    try {
      const body = createUserSchema.parse(req.body);
      res.status(201).json({ data: await createUser(store, body, actorOf(req)) });
    } catch (error) {
      next(error);
    }
  });

  router.patch('/users/:id', manageUsers, async (req, res, next) => {
    try {
      const id = z.string().uuid().safeParse(req.params.id);
      if (!id.success) throw notFound('User', req.params.id);
      const body = updateUserSchema.parse(req.body);
      res.json({ data: await updateUser(store, id.data, body, actorOf(req)) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/audit/verify', requirePermission(Permission.AUDIT_VERIFY), async (_req, res, next) => {
    try {
      const breaks = await store.verifyAuditChain();
      if (breaks.length > 0) {
        log.error({ breaks: breaks.length, first: breaks[0] }, 'Audit hash chain is broken');
      }
      res.json({ data: { intact: breaks.length === 0, breaks } });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
