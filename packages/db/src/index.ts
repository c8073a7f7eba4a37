export { db, schema, setLockTimeout, createMigrationClient, closeDb } from './client.js';
export type { Database, DbTransaction, DbOrTransaction } from './client.js';
export { writeAuditEntry, verifyAuditChain } from './audit-writer.js';
export type { AuditEntryInput, AuditEntryResult, AuditChainBreak } from './audit-writer.js';
export { DuplicateKeyError, isUniqueViolation, isRetryableStorageError } from './errors.js';
export { DrizzleRequisitionStore, type DrizzleStoreOptions } from './store/drizzle-store.js';
export { UNIQUE_CONSTRAINTS } from './store/types.js';
export type * from './store/types.js';
