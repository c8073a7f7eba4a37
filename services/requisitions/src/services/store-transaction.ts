import { DuplicateKeyError, isRetryableStorageError, type RequisitionStore, type RequisitionStoreTx } from '@stockroom/db';
import { AppError, StorageFailureError } from '../middleware/error-handler.js';

/**
 * Run `work` in one store transaction. Failures of the store itself (lock
 * timeout, deadlock, lost connection) become a retryable StorageFailureError;
 * everything else propagates as thrown.
 */
export async function inTransaction<T>(
  store: RequisitionStore,
  work: (tx: RequisitionStoreTx) => Promise<T>,
): Promise<T> {
  try {
    return await store.transaction(work);
  } catch (err) {
    if (!(err instanceof AppError) && isRetryableStorageError(err)) {
      throw new StorageFailureError(undefined, { cause: err });
    }
    throw err;
  }
}

/** Turn a unique-index collision into a 409 naming the clashing field. */
export function rethrowDuplicate(err: unknown, field: string, value: string): never {
  if (err instanceof DuplicateKeyError) {
    throw new AppError(409, `${field} "${value}" is already in use`, 'DUPLICATE_REFERENCE', { field, value });
  }
  throw err;
}
