import type { Request, Response, NextFunction } from 'express';
import type { AuthRequest } from './middleware.js';

// ─── Audit Context ──────────────────────────────────────────────────

/** Who did it and from where; copied onto every audit entry a request writes. */
export interface AuditContext {
  userId?: string;
  ipAddress?: string;
  userAgent?: string;
}

export interface AuditContextRequest extends AuthRequest {
  auditContext?: AuditContext;
}

// Column widths in audit.audit_log
const MAX_IP_LENGTH = 45;
const MAX_USER_AGENT_LENGTH = 500;

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Attaches `req.auditContext`. Must run after authMiddleware so the user id
 * is known. The first X-Forwarded-For entry wins over the socket address.
 */
export function auditContextMiddleware(req: Request, _res: Response, next: NextFunction): void {
  const auditReq = req as AuditContextRequest;

  const forwardedIp = firstHeader(req.headers['x-forwarded-for'])?.split(',')[0]?.trim();
  const ip = forwardedIp || req.socket.remoteAddress || undefined;
  const userAgent = firstHeader(req.headers['user-agent']);

  auditReq.auditContext = {
    userId: auditReq.user?.sub,
    ipAddress: ip?.slice(0, MAX_IP_LENGTH),
    userAgent: userAgent?.slice(0, MAX_USER_AGENT_LENGTH),
  };

  next();
}

/** The context attached by auditContextMiddleware, or an empty one. */
export function getAuditContext(req: Request): AuditContext {
  return (req as AuditContextRequest).auditContext ?? {};
}
