import type { Request, Response, NextFunction } from 'express';
import type { ErrorResponseBody } from '@stockroom/shared-types';
import { verifyAccessToken, type JwtPayload } from './jwt.js';

export interface AuthRequest extends Request {
  user?: JwtPayload;
}

/**
 * Express middleware that requires a valid `Authorization: Bearer <token>`
 * header and attaches the decoded identity as `req.user`.
 */
export function authMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers.authorization;
  if (!header?.startsWith('Bearer ')) {
    const body: ErrorResponseBody = { error: 'Authentication required', code: 'UNAUTHORIZED' };
    res.status(401).json(body);
    return;
  }

  try {
    (req as AuthRequest).user = verifyAccessToken(header.slice('Bearer '.length).trim());
    next();
  } catch {
    const body: ErrorResponseBody = { error: 'Invalid or expired token', code: 'UNAUTHORIZED' };
    res.status(401).json(body);
  }
}
