import {
  pgSchema,
  uuid,
  varchar,
  text,
  integer,
  boolean,
  doublePrecision,
  timestamp,
  index,
  uniqueIndex,
  check,
} from 'drizzle-orm/pg-core';
import { relations, sql } from 'drizzle-orm';
import { REQUISITION_STATUSES } from '@stockroom/shared-types';
import { users } from './users.js';
import { areas, machines, inventoryItems } from './warehouse.js';

export const requisitionsSchema = pgSchema('requisitions');

// ─── Enums ────────────────────────────────────────────────────────────
export const requisitionStatusEnum = requisitionsSchema.enum('requisition_status', REQUISITION_STATUSES);

// ─── Requisitions ─────────────────────────────────────────────────────
export const requisitions = requisitionsSchema.table(
  'requisitions',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    code: varchar('code', { length: 20 }).notNull(), // REQ-YYYYMMDD-NNNN
    requesterId: uuid('requester_id')
      .notNull()
      .references(() => users.id),
    machineId: uuid('machine_id').references(() => machines.id),
    areaId: uuid('area_id').references(() => areas.id),
    status: requisitionStatusEnum('status').notNull().default('pending'),
    note: text('note').notNull().default(''),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('requisitions_code_idx').on(table.code),
    index('requisitions_requester_idx').on(table.requesterId),
    index('requisitions_status_idx').on(table.status, table.createdAt),
    index('requisitions_created_idx').on(table.createdAt),
  ]
);

// ─── Requisition Items ────────────────────────────────────────────────
export const requisitionItems = requisitionsSchema.table(
  'requisition_items',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    requisitionId: uuid('requisition_id')
      .notNull()
      .references(() => requisitions.id),
    lineNumber: integer('line_number').notNull(),
    inventoryItemId: uuid('inventory_item_id')
      .notNull()
      .references(() => inventoryItems.id),
    qtyRequested: doublePrecision('qty_requested').notNull(),
    qtyApproved: doublePrecision('qty_approved'), // null until decided
  },
  (table) => [
    uniqueIndex('requisition_items_line_idx').on(table.requisitionId, table.lineNumber),
    index('requisition_items_inventory_idx').on(table.inventoryItemId),
    check('requisition_items_requested_positive', sql`${table.qtyRequested} > 0`),
    check(
      'requisition_items_approved_range',
      sql`${table.qtyApproved} IS NULL OR (${table.qtyApproved} >= 0 AND ${table.qtyApproved} <= ${table.qtyRequested})`
    ),
  ]
);

// ─── Approvals ────────────────────────────────────────────────────────
// Append-only: one row per decision.
export const approvals = requisitionsSchema.table(
  'approvals',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    requisitionId: uuid('requisition_id')
      .notNull()
      .references(() => requisitions.id),
    approverId: uuid('approver_id')
      .notNull()
      .references(() => users.id),
    approved: boolean('approved').notNull(),
    comment: text('comment').notNull().default(''),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('approvals_requisition_idx').on(table.requisitionId),
    index('approvals_approver_idx').on(table.approverId),
  ]
);

// ─── Code Counters ────────────────────────────────────────────────────
// One row per calendar day; incremented under its row lock.
export const requisitionCodeCounters = requisitionsSchema.table('requisition_code_counters', {
  day: varchar('day', { length: 8 }).primaryKey(), // YYYYMMDD
  lastSequence: integer('last_sequence').notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

// ─── Relations ────────────────────────────────────────────────────────
export const requisitionsRelations = relations(requisitions, ({ one, many }) => ({
  requester: one(users, {
    fields: [requisitions.requesterId],
    references: [users.id],
  }),
  machine: one(machines, {
    fields: [requisitions.machineId],
    references: [machines.id],
  }),
  area: one(areas, {
    fields: [requisitions.areaId],
    references: [areas.id],
  }),
  items: many(requisitionItems),
  approvals: many(approvals),
}));

export const requisitionItemsRelations = relations(requisitionItems, ({ one }) => ({
  requisition: one(requisitions, {
    fields: [requisitionItems.requisitionId],
    references: [requisitions.id],
  }),
  inventoryItem: one(inventoryItems, {
    fields: [requisitionItems.inventoryItemId],
    references: [inventoryItems.id],
  }),
}));

export const approvalsRelations = relations(approvals, ({ one }) => ({
  requisition: one(requisitions, {
    fields: [approvals.requisitionId],
    references: [requisitions.id],
  }),
  approver: one(users, {
    fields: [approvals.approverId],
    references: [users.id],
  }),
}));
