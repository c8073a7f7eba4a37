// ─── Postgres Error Classification ───────────────────────────────────
// postgres.js raises PostgresError with a SQLSTATE `code`; newer drizzle
// releases wrap it, so the original is looked up through `cause`.

interface PgErrorFields {
  code: string;
  constraint?: string;
}

function readPgFields(err: unknown): PgErrorFields | null {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      const constraint =
        'constraint_name' in current && typeof current.constraint_name === 'string'
          ? current.constraint_name
          : undefined;
      return { code: current.code, constraint };
    }
    current = 'cause' in current ? current.cause : undefined;
  }
  return null;
}

/** Duplicate key on a unique index, optionally a specific one. */
export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  const fields = readPgFields(err);
  if (!fields || fields.code !== '23505') return false;
  return constraint === undefined || fields.constraint === constraint;
}

const RETRYABLE_SQLSTATES = new Set([
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '55P03', // lock_not_available (lock_timeout)
  '57014', // query_canceled (statement_timeout)
  '57P01', // admin_shutdown
  '53300', // too_many_connections
]);

const CONNECTION_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'CONNECTION_CLOSED', 'CONNECT_TIMEOUT']);

/**
 * True for failures of the store itself (locks, timeouts, lost connections)
 * that a caller can retry after re-reading state.
 */
export function isRetryableStorageError(err: unknown): boolean {
  const fields = readPgFields(err);
  if (!fields) return false;
  return (
    RETRYABLE_SQLSTATES.has(fields.code) ||
    fields.code.startsWith('08') || // connection_exception class
    CONNECTION_ERROR_CODES.has(fields.code)
  );
}

/** Raised by a store when an insert collides with a unique index. */
export class DuplicateKeyError extends Error {
  constructor(
    public readonly constraint: string,
    options?: { cause?: unknown },
  ) {
    super(`Duplicate key violates unique constraint "${constraint}"`, options);
    this.name = 'DuplicateKeyError';
  }
}
