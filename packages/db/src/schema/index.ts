// ─── Schema Barrel Export ─────────────────────────────────────────────
// All Drizzle schema definitions exported from here.
// This is the single import point for migrations and the Drizzle client.

export * from './users.js';
export * from './warehouse.js';
export * from './requisitions.js';
export * from './audit.js';
