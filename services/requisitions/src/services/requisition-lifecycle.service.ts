/**
 * Requisition Lifecycle Engine
 *
 * Creation and decision of requisitions. Each call is exactly one store
 * transaction: every row it writes (requisition, items, stock, approval,
 * audit) commits together or not at all. Nothing here retries a decision.
 *
 * State machine:
 *   pending → approved | partially_approved | rejected
 */

import { config, createLogger } from '@stockroom/config';
import type {
  AreaRow,
  InventoryItemRow,
  MachineRow,
  RequisitionDetail,
  RequisitionItemRow,
  RequisitionStore,
  RequisitionStoreTx,
  UserRow,
} from '@stockroom/db';
import {
  canTransition,
  type RequisitionDecision,
  type RequisitionLineInput,
  type RequisitionStatus,
} from '@stockroom/shared-types';
import { canDecide, type AuditContext } from '@stockroom/auth-utils';
import { AppError, StateConflictError, ValidationError, notFound } from '../middleware/error-handler.js';
import { inTransaction } from './store-transaction.js';
import { formatCodeDay, withUniqueRequisitionCode } from './requisition-code.service.js';
import { decrementStock, lockStock, type DecrementResult, type LedgerContext } from './inventory-ledger.service.js';

const log = createLogger('requisition-lifecycle');

// ─── Types ────────────────────────────────────────────────────────────

export interface LifecycleOptions {
  /** IANA zone that decides the calendar day in requisition codes. */
  codeTimeZone: string;
  maxCodeAttempts: number;
  now: () => Date;
}

export interface SubmitRequisitionInput {
  requesterId: string;
  machineId?: string | null;
  areaId?: string | null;
  items: RequisitionLineInput[];
  note?: string;
  audit?: AuditContext;
}

export interface DecideRequisitionInput {
  requisitionId: string;
  approverId: string;
  decision: RequisitionDecision;
  /** RequisitionItem id → approved quantity. Absent items approve 0; ignored on reject. */
  approvedQuantities?: Record<string, number>;
  comment?: string;
  audit?: AuditContext;
}

export interface DecisionLineResult {
  requisitionItemId: string;
  inventoryItemId: string;
  qtyRequested: number;
  qtyApproved: number;
  shortfall: number;
  /** Null when the line did not touch stock. */
  previousStock: number | null;
  newStock: number | null;
}

export interface DecisionResult {
  requisition: RequisitionDetail;
  lines: DecisionLineResult[];
}

export function defaultLifecycleOptions(): LifecycleOptions {
  return {
    codeTimeZone: config.REQUISITION_CODE_TIMEZONE,
    maxCodeAttempts: config.REQUISITION_CODE_MAX_ATTEMPTS,
    now: () => new Date(),
  };
}

// ─── Helpers ──────────────────────────────────────────────────────────

/**
 * Drop non-positive quantities, keeping input order. A non-finite quantity
 * is a caller error rather than something to drop.
 */
export function normalizeLines(items: RequisitionLineInput[]): RequisitionLineInput[] {
  const invalid = items.filter((item) => !Number.isFinite(item.qty));
  if (invalid.length > 0) {
    throw new ValidationError('INVALID_QUANTITY', 'Quantities must be finite numbers', {
      inventoryItemIds: invalid.map((item) => item.inventoryItemId),
    });
  }

  const lines = items.filter((item) => item.qty > 0);
  if (lines.length === 0) {
    throw new ValidationError('EMPTY_REQUISITION', 'A requisition needs at least one item with a positive quantity');
  }
  return lines;
}

/**
 * Check the whole approved-quantity mapping before anything is written.
 * Returns the quantity per requisition item, 0 for items the mapping omits.
 */
export function resolveApprovedQuantities(
  items: RequisitionItemRow[],
  approvedQuantities: Record<string, number>,
): Map<string, number> {
  const byId = new Map(items.map((item) => [item.id, item]));

  const unknownIds = Object.keys(approvedQuantities).filter((id) => !byId.has(id));
  if (unknownIds.length > 0) {
    throw new ValidationError('UNKNOWN_REQUISITION_ITEM', 'Approved quantities reference items outside this requisition', {
      unknownIds,
    });
  }

  const resolved = new Map<string, number>();
  const invalid: Array<{ requisitionItemId: string; qtyApproved: number; qtyRequested: number }> = [];

  for (const item of items) {
    const qty = approvedQuantities[item.id] ?? 0;
    if (!Number.isFinite(qty) || qty < 0 || qty > item.qtyRequested) {
      invalid.push({ requisitionItemId: item.id, qtyApproved: qty, qtyRequested: item.qtyRequested });
      continue;
    }
    resolved.set(item.id, qty);
  }

  if (invalid.length > 0) {
    throw new ValidationError(
      'INVALID_APPROVED_QUANTITY',
      'Approved quantities must be between 0 and the requested quantity',
      { invalid },
    );
  }
  return resolved;
}

/**
 * `approved` only when every line got its full requested quantity. An
 * approve decision that grants nothing is still `partially_approved`.
 */
export function deriveApprovalStatus(
  lines: Array<Pick<DecisionLineResult, 'qtyRequested' | 'qtyApproved'>>,
): Extract<RequisitionStatus, 'approved' | 'partially_approved'> {
  return lines.every((line) => line.qtyApproved === line.qtyRequested) ? 'approved' : 'partially_approved';
}

function toRequesterSummary(user: UserRow): RequisitionDetail['requester'] {
  return { id: user.id, username: user.username, fullName: user.fullName, role: user.role };
}

async function resolvePlacement(
  tx: RequisitionStoreTx,
  machineId: string | null,
  areaId: string | null,
): Promise<{ machine: MachineRow | null; area: AreaRow | null }> {
  const machine = machineId ? await tx.findMachine(machineId) : null;
  if (machineId && !machine) {
    throw new ValidationError('UNKNOWN_MACHINE', 'Unknown machine', { machineId });
  }

  const area = areaId ? await tx.findArea(areaId) : null;
  if (areaId && !area) {
    throw new ValidationError('UNKNOWN_AREA', 'Unknown area', { areaId });
  }

  if (machine?.areaId && area && machine.areaId !== area.id) {
    throw new ValidationError('MACHINE_AREA_MISMATCH', 'Machine belongs to a different area', {
      machineId: machine.id,
      machineAreaId: machine.areaId,
      areaId: area.id,
    });
  }

  // A machine placed in an area implies that area.
  if (machine?.areaId && !area) {
    return { machine, area: await tx.findArea(machine.areaId) };
  }
  return { machine, area };
}

// ─── Creation ─────────────────────────────────────────────────────────

export async function submitRequisition(
  store: RequisitionStore,
  input: SubmitRequisitionInput,
  options: LifecycleOptions = defaultLifecycleOptions(),
): Promise<RequisitionDetail> {
  const lines = normalizeLines(input.items);

  const detail = await inTransaction(store, async (tx) => {
    const requester = await tx.findUser(input.requesterId);
    if (!requester) {
      throw new ValidationError('UNKNOWN_REQUESTER', 'Unknown requester', { requesterId: input.requesterId });
    }

    const { machine, area } = await resolvePlacement(tx, input.machineId ?? null, input.areaId ?? null);

    const itemIds = [...new Set(lines.map((line) => line.inventoryItemId))];
    const inventory = new Map<string, InventoryItemRow>(
      (await tx.findInventoryItems(itemIds)).map((row) => [row.id, row]),
    );
    const unknownIds = itemIds.filter((id) => !inventory.has(id));
    if (unknownIds.length > 0) {
      throw new ValidationError('UNKNOWN_INVENTORY_ITEM', 'Unknown inventory item', { unknownIds });
    }
    const resolvedLines = lines.flatMap((line) => {
      const inventoryItem = inventory.get(line.inventoryItemId);
      return inventoryItem ? [{ ...line, inventoryItem }] : [];
    });

    const createdAt = options.now();
    const day = formatCodeDay(createdAt, options.codeTimeZone);
    const requisition = await withUniqueRequisitionCode(tx, day, options.maxCodeAttempts, (code) =>
      tx.insertRequisition({
        code,
        requesterId: requester.id,
        machineId: machine?.id ?? null,
        areaId: area?.id ?? null,
        note: input.note ?? '',
        createdAt,
      }),
    );

    const items = await tx.insertRequisitionItems(
      resolvedLines.map((line, index) => ({
        requisitionId: requisition.id,
        lineNumber: index + 1,
        inventoryItemId: line.inventoryItemId,
        qtyRequested: line.qty,
      })),
    );

    await tx.appendAudit({
      userId: requester.id,
      action: 'requisition.created',
      entityType: 'requisition',
      entityId: requisition.id,
      newState: { code: requisition.code, status: requisition.status },
      metadata: {
        lines: items.map((item) => ({ inventoryItemId: item.inventoryItemId, qtyRequested: item.qtyRequested })),
        machineId: requisition.machineId,
        areaId: requisition.areaId,
      },
      ipAddress: input.audit?.ipAddress ?? null,
      userAgent: input.audit?.userAgent ?? null,
      timestamp: createdAt,
    });

    const created: RequisitionDetail = {
      ...requisition,
      requester: toRequesterSummary(requester),
      machine,
      area,
      items: items.map((item) => ({ ...item, inventoryItem: resolvedLines[item.lineNumber - 1].inventoryItem })),
      approvals: [],
    };
    return created;
  });

  log.info({ requisitionId: detail.id, code: detail.code, requesterId: detail.requesterId }, 'Requisition submitted');
  return detail;
}

// ─── Decision ─────────────────────────────────────────────────────────

/** Every line gets 0; stock is untouched. */
async function rejectItems(tx: RequisitionStoreTx, items: RequisitionItemRow[]): Promise<DecisionLineResult[]> {
  const lines: DecisionLineResult[] = [];
  for (const item of items) {
    await tx.setApprovedQuantity(item.id, 0);
    lines.push({
      requisitionItemId: item.id,
      inventoryItemId: item.inventoryItemId,
      qtyRequested: item.qtyRequested,
      qtyApproved: 0,
      shortfall: 0,
      previousStock: null,
      newStock: null,
    });
  }
  return lines;
}

/**
 * Validate the mapping, lock the affected stock rows in id order, then take
 * stock line by line. A line's approved quantity is what the ledger could
 * actually decrement.
 */
async function approveItems(
  tx: RequisitionStoreTx,
  items: RequisitionItemRow[],
  approvedQuantities: Record<string, number>,
  context: LedgerContext,
): Promise<DecisionLineResult[]> {
  const approved = resolveApprovedQuantities(items, approvedQuantities);
  await lockStock(
    tx,
    items.filter((item) => (approved.get(item.id) ?? 0) > 0).map((item) => item.inventoryItemId),
  );

  const lines: DecisionLineResult[] = [];
  for (const item of items) {
    const qty = approved.get(item.id) ?? 0;
    const movement: DecrementResult | null =
      qty > 0 ? await decrementStock(tx, item.inventoryItemId, qty, context) : null;
    const qtyApproved = movement ? movement.decremented : 0;

    await tx.setApprovedQuantity(item.id, qtyApproved);
    lines.push({
      requisitionItemId: item.id,
      inventoryItemId: item.inventoryItemId,
      qtyRequested: item.qtyRequested,
      qtyApproved,
      shortfall: movement ? movement.shortfall : 0,
      previousStock: movement ? movement.previousStock : null,
      newStock: movement ? movement.newStock : null,
    });
  }
  return lines;
}

export async function decideRequisition(
  store: RequisitionStore,
  input: DecideRequisitionInput,
  options: LifecycleOptions = defaultLifecycleOptions(),
): Promise<DecisionResult> {
  const result = await inTransaction(store, async (tx) => {
    const requisition = await tx.lockRequisition(input.requisitionId);
    if (!requisition) throw notFound('Requisition', input.requisitionId);

    if (requisition.status !== 'pending') {
      throw new StateConflictError(`Requisition ${requisition.code} has already been decided`, {
        requisitionId: requisition.id,
        status: requisition.status,
      });
    }

    const approver = await tx.findUser(input.approverId);
    if (!approver) {
      throw new ValidationError('UNKNOWN_APPROVER', 'Unknown approver', { approverId: input.approverId });
    }
    if (!canDecide(approver.role)) {
      throw new AppError(403, 'Only approvers and administrators can decide requisitions', 'FORBIDDEN', {
        role: approver.role,
      });
    }

    const decidedAt = options.now();
    const items = await tx.listRequisitionItems(requisition.id);
    const lines =
      input.decision === 'reject'
        ? await rejectItems(tx, items)
        : await approveItems(tx, items, input.approvedQuantities ?? {}, {
            at: decidedAt,
            userId: approver.id,
            requisitionId: requisition.id,
            requisitionCode: requisition.code,
            ipAddress: input.audit?.ipAddress,
            userAgent: input.audit?.userAgent,
          });
    const status: RequisitionStatus = input.decision === 'reject' ? 'rejected' : deriveApprovalStatus(lines);

    if (!canTransition(requisition.status, status)) {
      throw new StateConflictError(`Cannot move requisition from ${requisition.status} to ${status}`, {
        requisitionId: requisition.id,
        from: requisition.status,
        to: status,
      });
    }

    await tx.setRequisitionStatus(requisition.id, status, decidedAt);
    await tx.insertApproval({
      requisitionId: requisition.id,
      approverId: approver.id,
      approved: input.decision === 'approve',
      comment: input.comment ?? '',
      createdAt: decidedAt,
    });
    await tx.appendAudit({
      userId: approver.id,
      action: `requisition.${status}`,
      entityType: 'requisition',
      entityId: requisition.id,
      previousState: { status: requisition.status },
      newState: { status },
      metadata: {
        code: requisition.code,
        decision: input.decision,
        lines: lines.map(({ requisitionItemId, qtyRequested, qtyApproved, shortfall }) => ({
          requisitionItemId,
          qtyRequested,
          qtyApproved,
          shortfall,
        })),
      },
      ipAddress: input.audit?.ipAddress ?? null,
      userAgent: input.audit?.userAgent ?? null,
      timestamp: decidedAt,
    });

    const decided = await tx.findRequisition(requisition.id);
    if (!decided) throw notFound('Requisition', requisition.id);
    return { requisition: decided, lines };
  });

  const shortLines = result.lines.filter((line) => line.shortfall > 0);
  log.info(
    {
      requisitionId: result.requisition.id,
      code: result.requisition.code,
      status: result.requisition.status,
      approverId: input.approverId,
    },
    'Requisition decided',
  );
  if (shortLines.length > 0) {
    log.warn({ requisitionId: result.requisition.id, shortLines }, 'Approved quantities exceeded available stock');
  }
  return result;
}
