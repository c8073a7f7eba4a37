import type { Request, Response, NextFunction } from 'express';
import type { ErrorResponseBody, UserRole } from '@stockroom/shared-types';
import type { AuthRequest } from './middleware.js';

// ─── Permission String Type ──────────────────────────────────────────
// Pattern: area:resource:action

export const Permission = {
  // ─── Auth ──────────────────────────────────────────────────────────
  AUTH_PROFILE_READ: 'auth:profile:read',
  AUTH_USERS_MANAGE: 'auth:users:manage',

  // ─── Requisitions ──────────────────────────────────────────────────
  REQUISITIONS_CREATE: 'requisitions:requisitions:create',
  REQUISITIONS_READ_OWN: 'requisitions:requisitions:read_own',
  REQUISITIONS_READ_ALL: 'requisitions:requisitions:read_all',
  REQUISITIONS_DECIDE: 'requisitions:requisitions:decide',
  REQUISITIONS_HISTORY_READ: 'requisitions:history:read',
  REQUISITIONS_REPORTS_READ: 'requisitions:reports:read',

  // ─── Warehouse ─────────────────────────────────────────────────────
  INVENTORY_READ: 'warehouse:inventory:read',
  INVENTORY_CREATE: 'warehouse:inventory:create',
  REFERENCE_DATA_READ: 'warehouse:reference_data:read',
  REFERENCE_DATA_MANAGE: 'warehouse:reference_data:manage',

  // ─── Audit ─────────────────────────────────────────────────────────
  AUDIT_VERIFY: 'audit:log:verify',
} as const;

export type PermissionString = (typeof Permission)[keyof typeof Permission];

// ─── Role → Permission Mapping ───────────────────────────────────────
// administrator holds every permission.

export const ROLE_PERMISSIONS: Record<UserRole, ReadonlySet<PermissionString>> = {
  requester: new Set([
    Permission.AUTH_PROFILE_READ,
    Permission.REQUISITIONS_CREATE,
    Permission.REQUISITIONS_READ_OWN,
    Permission.REQUISITIONS_HISTORY_READ,
    Permission.INVENTORY_READ,
    Permission.REFERENCE_DATA_READ,
  ]),

  approver: new Set([
    Permission.AUTH_PROFILE_READ,
    Permission.REQUISITIONS_READ_OWN,
    Permission.REQUISITIONS_READ_ALL,
    Permission.REQUISITIONS_DECIDE,
    Permission.REQUISITIONS_HISTORY_READ,
    Permission.REQUISITIONS_REPORTS_READ,
    Permission.INVENTORY_READ,
    Permission.REFERENCE_DATA_READ,
  ]),

  administrator: new Set(Object.values(Permission)),
};

// ─── Permission Check Utility ────────────────────────────────────────

export function hasPermission(role: UserRole, permission: PermissionString): boolean {
  return ROLE_PERMISSIONS[role].has(permission);
}

export function hasAllPermissions(role: UserRole, permissions: PermissionString[]): boolean {
  return permissions.every((p) => hasPermission(role, p));
}

export function getPermissionsForRole(role: UserRole): PermissionString[] {
  return [...ROLE_PERMISSIONS[role]];
}

/** Roles allowed to decide requisitions. */
export function canDecide(role: UserRole): boolean {
  return hasPermission(role, Permission.REQUISITIONS_DECIDE);
}

// ─── Express Middleware ──────────────────────────────────────────────

/**
 * Express middleware that requires the authenticated user to hold every
 * listed permission. Must be used AFTER authMiddleware.
 *
 * Usage:
 *   router.post('/:id/decision', requirePermission(Permission.REQUISITIONS_DECIDE), handler);
 */
export function requirePermission(...permissions: PermissionString[]) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authReq = req as AuthRequest;
    if (!authReq.user) {
      const body: ErrorResponseBody = { error: 'Authentication required', code: 'UNAUTHORIZED' };
      res.status(401).json(body);
      return;
    }

    const { role } = authReq.user;
    if (!hasAllPermissions(role, permissions)) {
      const body: ErrorResponseBody = {
        error: 'Insufficient permissions',
        code: 'FORBIDDEN',
        details: { required: permissions, role },
      };
      res.status(403).json(body);
      return;
    }

    next();
  };
}
