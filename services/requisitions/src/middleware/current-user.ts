import type { Request } from 'express';
import type { AuthRequest, JwtPayload } from '@stockroom/auth-utils';
import { AppError } from './error-handler.js';

/** The identity authMiddleware attached; 401 when a route is reached without one. */
export function currentUser(req: Request): JwtPayload {
  const { user } = req as AuthRequest;
  if (!user) throw new AppError(401, 'Authentication required', 'UNAUTHORIZED');
  return user;
}
