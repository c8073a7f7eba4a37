// ─── Shared Types for Stockroom ────────────────────────────────────────
// Types used across packages and the requisitions service.
// Import from @stockroom/shared-types.

// ─── User Roles ───────────────────────────────────────────────────────
export const USER_ROLES = ['requester', 'approver', 'administrator'] as const;

export type UserRole = (typeof USER_ROLES)[number];

// ─── Requisition Lifecycle ────────────────────────────────────────────
export const REQUISITION_STATUSES = [
  'pending',
  'approved',
  'partially_approved',
  'rejected',
  'cancelled',
] as const;

export type RequisitionStatus = (typeof REQUISITION_STATUSES)[number];

export type RequisitionDecision = 'approve' | 'reject';

// `cancelled` is reserved: nothing transitions into it yet.
export const REQUISITION_VALID_TRANSITIONS: Record<RequisitionStatus, RequisitionStatus[]> = {
  pending: ['approved', 'partially_approved', 'rejected'],
  approved: [],
  partially_approved: [],
  rejected: [],
  cancelled: [],
};

export function canTransition(from: RequisitionStatus, to: RequisitionStatus): boolean {
  return REQUISITION_VALID_TRANSITIONS[from].includes(to);
}

// ─── Requisition Codes ────────────────────────────────────────────────
export const REQUISITION_CODE_PREFIX = 'REQ';

/** REQ-YYYYMMDD-NNNN */
export const REQUISITION_CODE_PATTERN = /^REQ-(\d{8})-(\d{4})$/;

// ─── Error Codes ──────────────────────────────────────────────────────
export type ValidationErrorCode =
  | 'EMPTY_REQUISITION'
  | 'INVALID_QUANTITY'
  | 'UNKNOWN_INVENTORY_ITEM'
  | 'UNKNOWN_REQUESTER'
  | 'UNKNOWN_APPROVER'
  | 'UNKNOWN_MACHINE'
  | 'UNKNOWN_AREA'
  | 'MACHINE_AREA_MISMATCH'
  | 'UNKNOWN_REQUISITION_ITEM'
  | 'INVALID_APPROVED_QUANTITY';

export type ErrorCode =
  | ValidationErrorCode
  | 'INVALID_REQUEST'
  | 'INVALID_STATE_TRANSITION'
  | 'DUPLICATE_REFERENCE'
  | 'CODE_GENERATION_FAILED'
  | 'STORAGE_FAILURE'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR';

export interface ErrorResponseBody {
  error: string;
  code: ErrorCode;
  details?: Record<string, unknown>;
  retryable?: boolean;
}

// ─── API Payloads ─────────────────────────────────────────────────────
export interface RequisitionLineInput {
  inventoryItemId: string;
  qty: number;
}

export interface RequisitionKpis {
  total: number;
  byStatus: Record<RequisitionStatus, number>;
  /** Mean hours between creation and the first approval; null when nothing was approved. */
  averageApprovalHours: number | null;
  topRequestedItems: Array<{
    inventoryItemId: string;
    sku: string;
    description: string;
    totalRequested: number;
  }>;
}
