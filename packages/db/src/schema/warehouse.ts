import {
  pgSchema,
  uuid,
  varchar,
  doublePrecision,
  timestamp,
  index,
  uniqueIndex,
  check,
} from 'drizzle-orm/pg-core';
import { relations, sql } from 'drizzle-orm';

export const warehouseSchema = pgSchema('warehouse');

// ─── Areas ────────────────────────────────────────────────────────────
export const areas = warehouseSchema.table(
  'areas',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    code: varchar('code', { length: 50 }).notNull(),
    name: varchar('name', { length: 200 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [uniqueIndex('areas_code_idx').on(table.code)]
);

// ─── Machines ─────────────────────────────────────────────────────────
export const machines = warehouseSchema.table(
  'machines',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    code: varchar('code', { length: 50 }).notNull(),
    name: varchar('name', { length: 200 }).notNull(),
    areaId: uuid('area_id').references(() => areas.id),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('machines_code_idx').on(table.code),
    index('machines_area_idx').on(table.areaId),
  ]
);

// ─── Inventory Items ──────────────────────────────────────────────────
// Stock is mutated only through the inventory ledger service.
export const inventoryItems = warehouseSchema.table(
  'inventory_items',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    sku: varchar('sku', { length: 100 }).notNull(),
    description: varchar('description', { length: 500 }).notNull(),
    stock: doublePrecision('stock').notNull().default(0),
    unit: varchar('unit', { length: 20 }).notNull().default('un'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('inventory_items_sku_idx').on(table.sku),
    check('inventory_items_stock_non_negative', sql`${table.stock} >= 0`),
  ]
);

// ─── Relations ────────────────────────────────────────────────────────
export const areasRelations = relations(areas, ({ many }) => ({
  machines: many(machines),
}));

export const machinesRelations = relations(machines, ({ one }) => ({
  area: one(areas, {
    fields: [machines.areaId],
    references: [areas.id],
  }),
}));
