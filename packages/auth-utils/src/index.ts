export { hashPassword, verifyPassword } from './password.js';
export { generateAccessToken, verifyAccessToken, type JwtPayload } from './jwt.js';
export { authMiddleware, type AuthRequest } from './middleware.js';
export {
  Permission,
  type PermissionString,
  ROLE_PERMISSIONS,
  hasPermission,
  hasAllPermissions,
  getPermissionsForRole,
  canDecide,
  requirePermission,
} from './permissions.js';
export {
  auditContextMiddleware,
  getAuditContext,
  type AuditContext,
  type AuditContextRequest,
} from './audit-context.js';
