import {
  pgSchema,
  uuid,
  varchar,
  timestamp,
  jsonb,
  bigint,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

export const auditSchema = pgSchema('audit');

// ─── Immutable Audit Log ─────────────────────────────────────────────
// Every significant action in the system gets a row here.
// This table is append-only. No updates, no deletes.
export const auditLog = auditSchema.table(
  'audit_log',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    userId: uuid('user_id'),                  // null for system actions
    action: varchar('action', { length: 100 }).notNull(), // e.g., 'requisition.created', 'inventory.decremented'
    entityType: varchar('entity_type', { length: 100 }).notNull(), // e.g., 'requisition', 'inventory_item'
    entityId: uuid('entity_id'),
    previousState: jsonb('previous_state'),   // snapshot before change
    newState: jsonb('new_state'),             // snapshot after change
    metadata: jsonb('metadata').$type<Record<string, unknown>>().default({}),
    ipAddress: varchar('ip_address', { length: 45 }),
    userAgent: varchar('user_agent', { length: 500 }),
    timestamp: timestamp('timestamp', { withTimezone: true }).notNull().defaultNow(),

    // ── Hash-chain audit integrity ───────────────────────────────────
    // Each row is linked to the previous via SHA-256 hash, forming a
    // single append-only tamper-evident chain.
    hashChain: varchar('hash_chain', { length: 64 }).notNull(),
    previousHash: varchar('previous_hash', { length: 64 }),
    sequenceNumber: bigint('sequence_number', { mode: 'number' }).notNull(),
  },
  (table) => [
    index('audit_user_idx').on(table.userId),
    index('audit_entity_idx').on(table.entityType, table.entityId),
    index('audit_action_idx').on(table.action),
    index('audit_time_idx').on(table.timestamp),
    uniqueIndex('audit_seq_idx').on(table.sequenceNumber),
    uniqueIndex('audit_hash_idx').on(table.hashChain),
  ]
);
