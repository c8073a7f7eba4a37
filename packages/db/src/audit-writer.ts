import { createHash } from 'node:crypto';
import { sql, desc, asc } from 'drizzle-orm';
import { auditLog } from './schema/audit.js';
import type { DbOrTransaction } from './client.js';

// ─── Types ──────────────────────────────────────────────────────────

export interface AuditEntryInput {
  userId?: string | null;
  action: string;
  entityType: string;
  entityId?: string | null;
  previousState?: unknown;
  newState?: unknown;
  metadata?: Record<string, unknown>;
  ipAddress?: string | null;
  userAgent?: string | null;
  timestamp?: Date;
}

export interface AuditEntryResult {
  id: string;
  hashChain: string;
  sequenceNumber: number;
}

export interface AuditChainBreak {
  sequenceNumber: number;
  expectedHash: string;
  actualHash: string;
}

// ─── Constants ──────────────────────────────────────────────────────

const GENESIS_SENTINEL = 'GENESIS';

// Fixed advisory lock key pair for the single audit chain ("AUDT", "LOG1").
const AUDIT_CHAIN_LOCK: [number, number] = [0x41554454, 0x4c4f4731];

/**
 * Canonical timestamp serialization used in hash computation:
 * ISO 8601 with milliseconds and Z suffix.
 * Example: "2026-01-15T10:00:00.000Z"
 */
function canonicalTimestamp(ts: Date): string {
  return ts.toISOString();
}

/**
 * Compute the SHA-256 hash for an audit entry.
 *
 *   sequence_number|action|entity_type|entity_id|timestamp|previous_hash
 *
 * - The first entry uses 'GENESIS' as previous_hash input
 * - NULL entity_id is represented as empty string
 */
function computeHash(input: {
  sequenceNumber: number;
  action: string;
  entityType: string;
  entityId: string | null | undefined;
  timestamp: Date;
  previousHash: string | null;
}): string {
  const payload = [
    input.sequenceNumber.toString(),
    input.action,
    input.entityType,
    input.entityId ?? '',
    canonicalTimestamp(input.timestamp),
    input.previousHash ?? GENESIS_SENTINEL,
  ].join('|');

  return createHash('sha256').update(payload).digest('hex');
}

// ─── Internal: lock + chain + insert (runs inside a transaction) ────

async function writeEntryInTx(
  tx: DbOrTransaction,
  entry: AuditEntryInput,
  ts: Date,
): Promise<AuditEntryResult> {
  const [hi, lo] = AUDIT_CHAIN_LOCK;
  await tx.execute(sql`SELECT pg_advisory_xact_lock(${hi}, ${lo})`);

  const [latest] = await tx
    .select({
      hashChain: auditLog.hashChain,
      sequenceNumber: auditLog.sequenceNumber,
    })
    .from(auditLog)
    .orderBy(desc(auditLog.sequenceNumber))
    .limit(1);

  const previousHash = latest?.hashChain ?? null;
  const nextSequence = latest ? latest.sequenceNumber + 1 : 1;

  const hashChain = computeHash({
    sequenceNumber: nextSequence,
    action: entry.action,
    entityType: entry.entityType,
    entityId: entry.entityId ?? null,
    timestamp: ts,
    previousHash,
  });

  const [inserted] = await tx
    .insert(auditLog)
    .values({
      userId: entry.userId ?? null,
      action: entry.action,
      entityType: entry.entityType,
      entityId: entry.entityId ?? null,
      previousState: entry.previousState ?? null,
      newState: entry.newState ?? null,
      metadata: entry.metadata ?? {},
      ipAddress: entry.ipAddress ?? null,
      userAgent: entry.userAgent ?? null,
      timestamp: ts,
      hashChain,
      previousHash,
      sequenceNumber: nextSequence,
    })
    .returning({
      id: auditLog.id,
      hashChain: auditLog.hashChain,
      sequenceNumber: auditLog.sequenceNumber,
    });

  return inserted;
}

// ─── Core Writer ────────────────────────────────────────────────────

/**
 * Write an immutable, hash-chained audit log entry.
 *
 * Self-transactional: with a bare `db` it opens a transaction, with an
 * existing `tx` Drizzle creates a savepoint, so the advisory lock and the
 * read-compute-insert sequence are always serialized. The advisory lock is
 * held until the outermost transaction ends.
 */
export async function writeAuditEntry(
  dbOrTx: DbOrTransaction,
  entry: AuditEntryInput,
): Promise<AuditEntryResult> {
  const ts = entry.timestamp ?? new Date();
  return dbOrTx.transaction(async (tx) => writeEntryInTx(tx, entry, ts));
}

// ─── Verification ───────────────────────────────────────────────────

/**
 * Recompute the chain over the whole log and report every row whose
 * stored hash differs from the recomputed one.
 */
export async function verifyAuditChain(dbOrTx: DbOrTransaction): Promise<AuditChainBreak[]> {
  const rows = await dbOrTx
    .select({
      action: auditLog.action,
      entityType: auditLog.entityType,
      entityId: auditLog.entityId,
      timestamp: auditLog.timestamp,
      hashChain: auditLog.hashChain,
      sequenceNumber: auditLog.sequenceNumber,
    })
    .from(auditLog)
    .orderBy(asc(auditLog.sequenceNumber));

  const breaks: AuditChainBreak[] = [];
  let previousHash: string | null = null;

  for (const row of rows) {
    const expectedHash = computeHash({
      sequenceNumber: row.sequenceNumber,
      action: row.action,
      entityType: row.entityType,
      entityId: row.entityId,
      timestamp: row.timestamp,
      previousHash,
    });
    if (expectedHash !== row.hashChain) {
      breaks.push({ sequenceNumber: row.sequenceNumber, expectedHash, actualHash: row.hashChain });
    }
    previousHash = row.hashChain;
  }

  return breaks;
}

// Re-export for testing / verification use cases
export { computeHash as _computeHash, canonicalTimestamp as _canonicalTimestamp };
