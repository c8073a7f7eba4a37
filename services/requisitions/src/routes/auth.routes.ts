import { Router } from 'express';
import { z } from 'zod';
import type { RequisitionStore } from '@stockroom/db';
import { Permission, getPermissionsForRole, requirePermission } from '@stockroom/auth-utils';
import { currentUser } from '../middleware/current-user.js';
import { getCurrentUser, login } from '../services/auth.service.js';

const loginSchema = z.object({
  username: z.string().trim().min(1).max(100),
  password: z.string().min(1).max(200),
});

/** POST /login, public. */
export function createLoginRouter(store: RequisitionStore): Router {
  const router = Router();

  router.post('/login', async (req, res, next) => {
    try {
      const credentials = loginSchema.parse(req.body);
      res.json({ data: await login(store, credentials) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}

/** GET /me, behind authMiddleware. */
export function createProfileRouter(store: RequisitionStore): Router {
  const router = Router();

  router.get('/me', requirePermission(Permission.AUTH_PROFILE_READ), async (req, res, next) => {
    try {
      const { sub } = currentUser(req);
      const user = await getCurrentUser(store, sub);
      res.json({ data: { ...user, permissions: getPermissionsForRole(user.role) } });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
