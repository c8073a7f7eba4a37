/**
 * Requisition Store contract
 *
 * The lifecycle engine and the query services talk to persistence only
 * through these interfaces. `RequisitionStore.transaction` runs its callback
 * in one read-committed transaction: either everything the callback wrote
 * commits, or nothing does. The `lock*` methods hold row locks until that
 * transaction ends.
 */

import type { RequisitionStatus, UserRole } from '@stockroom/shared-types';
import type {
  users,
  areas,
  machines,
  inventoryItems,
  requisitions,
  requisitionItems,
  approvals,
} from '../schema/index.js';
import type { AuditChainBreak, AuditEntryInput } from '../audit-writer.js';

// ─── Rows ─────────────────────────────────────────────────────────────

export type UserRow = typeof users.$inferSelect;
export type AreaRow = typeof areas.$inferSelect;
export type MachineRow = typeof machines.$inferSelect;
export type InventoryItemRow = typeof inventoryItems.$inferSelect;
export type RequisitionRow = typeof requisitions.$inferSelect;
export type RequisitionItemRow = typeof requisitionItems.$inferSelect;
export type ApprovalRow = typeof approvals.$inferSelect;

export type RequesterSummary = Pick<UserRow, 'id' | 'username' | 'fullName' | 'role'>;

export interface RequisitionItemDetail extends RequisitionItemRow {
  inventoryItem: InventoryItemRow;
}

export interface RequisitionDetail extends RequisitionRow {
  requester: RequesterSummary;
  machine: MachineRow | null;
  area: AreaRow | null;
  items: RequisitionItemDetail[];
  approvals: ApprovalRow[];
}

// ─── Inserts / Patches ────────────────────────────────────────────────

export interface NewUser {
  username: string;
  fullName: string;
  passwordHash: string;
  role: UserRole;
}

export interface UserPatch {
  fullName?: string;
  passwordHash?: string;
  role?: UserRole;
}

export interface NewArea {
  code: string;
  name: string;
}

export interface NewMachine {
  code: string;
  name: string;
  areaId: string | null;
}

export interface NewInventoryItem {
  sku: string;
  description: string;
  stock: number;
  unit: string;
}

export interface NewRequisition {
  code: string;
  requesterId: string;
  machineId: string | null;
  areaId: string | null;
  note: string;
  createdAt: Date;
}

export interface NewRequisitionItem {
  requisitionId: string;
  lineNumber: number;
  inventoryItemId: string;
  qtyRequested: number;
}

export interface NewApproval {
  requisitionId: string;
  approverId: string;
  approved: boolean;
  comment: string;
  createdAt: Date;
}

export interface RequisitionFilter {
  requesterId?: string;
  status?: RequisitionStatus;
  order: 'newest' | 'oldest';
  limit?: number;
}

// ─── Unique indexes a store may report through DuplicateKeyError ─────

export const UNIQUE_CONSTRAINTS = {
  requisitionCode: 'requisitions_code_idx',
  username: 'users_username_idx',
  areaCode: 'areas_code_idx',
  machineCode: 'machines_code_idx',
  inventorySku: 'inventory_items_sku_idx',
} as const;

// ─── Contracts ────────────────────────────────────────────────────────

/** Plain reads, available both inside and outside a transaction. */
export interface RequisitionReads {
  findRequisition(id: string): Promise<RequisitionDetail | null>;
  findUser(id: string): Promise<UserRow | null>;
  findArea(id: string): Promise<AreaRow | null>;
  findMachine(id: string): Promise<MachineRow | null>;
  findInventoryItems(ids: string[]): Promise<InventoryItemRow[]>;
}

export interface RequisitionStoreTx extends RequisitionReads {
  /** Atomically bump and return the per-day code sequence (1-based). */
  nextCodeSequence(day: string): Promise<number>;
  /** Throws DuplicateKeyError when the code is already taken; the transaction stays usable. */
  insertRequisition(values: NewRequisition): Promise<RequisitionRow>;
  insertRequisitionItems(values: NewRequisitionItem[]): Promise<RequisitionItemRow[]>;
  lockRequisition(id: string): Promise<RequisitionRow | null>;
  listRequisitionItems(requisitionId: string): Promise<RequisitionItemRow[]>;
  /** Locks the rows in ascending id order. */
  lockInventoryItems(ids: string[]): Promise<InventoryItemRow[]>;
  setInventoryStock(id: string, stock: number, updatedAt: Date): Promise<void>;
  setApprovedQuantity(requisitionItemId: string, qtyApproved: number): Promise<void>;
  setRequisitionStatus(id: string, status: RequisitionStatus, updatedAt: Date): Promise<RequisitionRow>;
  insertApproval(values: NewApproval): Promise<ApprovalRow>;
  appendAudit(entry: AuditEntryInput): Promise<void>;

  insertUser(values: NewUser): Promise<UserRow>;
  updateUser(id: string, patch: UserPatch, updatedAt: Date): Promise<UserRow | null>;
  insertArea(values: NewArea): Promise<AreaRow>;
  insertMachine(values: NewMachine): Promise<MachineRow>;
  insertInventoryItem(values: NewInventoryItem): Promise<InventoryItemRow>;
}

export interface RequisitionStore extends RequisitionReads {
  transaction<T>(work: (tx: RequisitionStoreTx) => Promise<T>): Promise<T>;
  listRequisitions(filter: RequisitionFilter): Promise<RequisitionDetail[]>;
  findInventoryItem(id: string): Promise<InventoryItemRow | null>;
  listInventoryItems(): Promise<InventoryItemRow[]>;
  findUserByUsername(username: string): Promise<UserRow | null>;
  listUsers(): Promise<UserRow[]>;
  listAreas(): Promise<AreaRow[]>;
  listMachines(): Promise<MachineRow[]>;
  /** Cheap connectivity check for health endpoints. */
  ping(): Promise<void>;
  /** Recompute the audit hash chain; empty when intact. */
  verifyAuditChain(): Promise<AuditChainBreak[]>;
}
