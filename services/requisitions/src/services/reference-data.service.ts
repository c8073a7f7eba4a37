/**
 * Reference Data Service
 *
 * Administrator-only maintenance of users, areas, machines and inventory
 * items. Every write is audited in the same transaction.
 */

import type { AreaRow, InventoryItemRow, MachineRow, RequisitionStore } from '@stockroom/db';
import { hashPassword, type AuditContext } from '@stockroom/auth-utils';
import type { UserRole } from '@stockroom/shared-types';
import { ValidationError, notFound } from '../middleware/error-handler.js';
import { toPublicUser, type PublicUser } from './auth.service.js';
import { inTransaction, rethrowDuplicate } from './store-transaction.js';

// ─── Types ────────────────────────────────────────────────────────────

export interface Actor {
  /** Null for system actions such as seeding. */
  userId: string | null;
  audit?: AuditContext;
}

export interface CreateUserInput {
  username: string;
  fullName: string;
  password: string;
  role: UserRole;
}

export interface UpdateUserInput {
  fullName?: string;
  password?: string;
  role?: UserRole;
}

export interface CreateAreaInput {
  code: string;
  name: string;
}

export interface CreateMachineInput {
  code: string;
  name: string;
  areaId?: string | null;
}

export interface CreateInventoryItemInput {
  sku: string;
  description: string;
  stock: number;
  unit?: string;
}

function auditFields(actor: Actor, at: Date) {
  return {
    userId: actor.userId,
    ipAddress: actor.audit?.ipAddress ?? null,
    userAgent: actor.audit?.userAgent ?? null,
    timestamp: at,
  };
}

// ─── Users ────────────────────────────────────────────────────────────

export async function listUsers(store: RequisitionStore): Promise<PublicUser[]> {
  return (await store.listUsers()).map(toPublicUser);
}

export async function createUser(store: RequisitionStore, input: CreateUserInput, actor: Actor): Promise<PublicUser> {
  const passwordHash = await hashPassword(input.password);
  const user = await inTransaction(store, async (tx) => {
    const created = await tx
      .insertUser({ username: input.username, fullName: input.fullName, passwordHash, role: input.role })
      .catch((err: unknown) => rethrowDuplicate(err, 'username', input.username));

    await tx.appendAudit({
      ...auditFields(actor, new Date()),
      action: 'user.created',
      entityType: 'user',
      entityId: created.id,
      newState: { username: created.username, role: created.role },
    });
    return created;
  });
  return toPublicUser(user);
}

/** Only administrators reach this: it changes credentials and roles. */
export async function updateUser(
  store: RequisitionStore,
  userId: string,
  input: UpdateUserInput,
  actor: Actor,
): Promise<PublicUser> {
  const passwordHash = input.password === undefined ? undefined : await hashPassword(input.password);
  const user = await inTransaction(store, async (tx) => {
    const before = await tx.findUser(userId);
    if (!before) throw notFound('User', userId);

    const now = new Date();
    const updated = await tx.updateUser(
      userId,
      {
        ...(input.fullName !== undefined && { fullName: input.fullName }),
        ...(input.role !== undefined && { role: input.role }),
        ...(passwordHash !== undefined && { passwordHash }),
      },
      now,
    );
    if (!updated) throw notFound('User', userId);

    await tx.appendAudit({
      ...auditFields(actor, now),
      action: 'user.updated',
      entityType: 'user',
      entityId: userId,
      previousState: { fullName: before.fullName, role: before.role },
      newState: { fullName: updated.fullName, role: updated.role },
      metadata: { passwordChanged: passwordHash !== undefined },
    });
    return updated;
  });
  return toPublicUser(user);
}

// ─── Areas & Machines ─────────────────────────────────────────────────

export async function listAreas(store: RequisitionStore): Promise<AreaRow[]> {
  return store.listAreas();
}

export async function createArea(store: RequisitionStore, input: CreateAreaInput, actor: Actor): Promise<AreaRow> {
  return inTransaction(store, async (tx) => {
    const area = await tx.insertArea(input).catch((err: unknown) => rethrowDuplicate(err, 'code', input.code));
    await tx.appendAudit({
      ...auditFields(actor, new Date()),
      action: 'area.created',
      entityType: 'area',
      entityId: area.id,
      newState: { code: area.code, name: area.name },
    });
    return area;
  });
}

export async function listMachines(store: RequisitionStore): Promise<MachineRow[]> {
  return store.listMachines();
}

export async function createMachine(
  store: RequisitionStore,
  input: CreateMachineInput,
  actor: Actor,
): Promise<MachineRow> {
  return inTransaction(store, async (tx) => {
    const areaId = input.areaId ?? null;
    if (areaId && !(await tx.findArea(areaId))) {
      throw new ValidationError('UNKNOWN_AREA', 'Unknown area', { areaId });
    }

    const machine = await tx
      .insertMachine({ code: input.code, name: input.name, areaId })
      .catch((err: unknown) => rethrowDuplicate(err, 'code', input.code));
    await tx.appendAudit({
      ...auditFields(actor, new Date()),
      action: 'machine.created',
      entityType: 'machine',
      entityId: machine.id,
      newState: { code: machine.code, name: machine.name, areaId: machine.areaId },
    });
    return machine;
  });
}

// ─── Inventory Items ──────────────────────────────────────────────────

/** New item with its initial stock. Stock changes after this only through approvals. */
export async function createInventoryItem(
  store: RequisitionStore,
  input: CreateInventoryItemInput,
  actor: Actor,
): Promise<InventoryItemRow> {
  if (!Number.isFinite(input.stock) || input.stock < 0) {
    throw new ValidationError('INVALID_QUANTITY', 'Initial stock must be a finite, non-negative number', {
      stock: input.stock,
    });
  }

  return inTransaction(store, async (tx) => {
    const item = await tx
      .insertInventoryItem({ sku: input.sku, description: input.description, stock: input.stock, unit: input.unit ?? 'un' })
      .catch((err: unknown) => rethrowDuplicate(err, 'sku', input.sku));
    await tx.appendAudit({
      ...auditFields(actor, new Date()),
      action: 'inventory_item.created',
      entityType: 'inventory_item',
      entityId: item.id,
      newState: { sku: item.sku, stock: item.stock, unit: item.unit },
    });
    return item;
  });
}
