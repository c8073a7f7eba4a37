import {
  pgSchema,
  uuid,
  varchar,
  text,
  timestamp,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';
import { USER_ROLES } from '@stockroom/shared-types';
import { requisitions, approvals } from './requisitions.js';

export const authSchema = pgSchema('auth');

// ─── Enums ────────────────────────────────────────────────────────────
export const userRoleEnum = authSchema.enum('user_role', USER_ROLES);

// ─── Users ────────────────────────────────────────────────────────────
export const users = authSchema.table(
  'users',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    username: varchar('username', { length: 100 }).notNull(),
    fullName: varchar('full_name', { length: 200 }).notNull(),
    passwordHash: text('password_hash').notNull(),
    role: userRoleEnum('role').notNull().default('requester'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('users_username_idx').on(table.username),
    index('users_role_idx').on(table.role),
  ]
);

export const usersRelations = relations(users, ({ many }) => ({
  requisitions: many(requisitions),
  approvals: many(approvals),
}));
