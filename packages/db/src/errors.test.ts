import { describe, expect, it } from 'vitest';
import { DuplicateKeyError, isRetryableStorageError, isUniqueViolation } from './errors.js';

function pgError(code: string, constraint?: string): Error {
  return Object.assign(new Error('pg failure'), { code, constraint_name: constraint });
}

describe('isUniqueViolation', () => {
  it('matches SQLSTATE 23505', () => {
    expect(isUniqueViolation(pgError('23505', 'requisitions_code_idx'))).toBe(true);
  });

  it('filters by constraint name when one is given', () => {
    const err = pgError('23505', 'users_username_idx');
    expect(isUniqueViolation(err, 'users_username_idx')).toBe(true);
    expect(isUniqueViolation(err, 'requisitions_code_idx')).toBe(false);
  });

  it('finds the driver error through a wrapping cause', () => {
    const wrapped = new Error('Failed query', { cause: pgError('23505', 'areas_code_idx') });
    expect(isUniqueViolation(wrapped, 'areas_code_idx')).toBe(true);
  });

  it('ignores other SQLSTATEs and non-errors', () => {
    expect(isUniqueViolation(pgError('23503'))).toBe(false);
    expect(isUniqueViolation('23505')).toBe(false);
    expect(isUniqueViolation(null)).toBe(false);
  });
});

describe('isRetryableStorageError', () => {
  it.each(['40001', '40P01', '55P03', '57014', '57P01', '53300', '08006', 'ECONNREFUSED', 'CONNECTION_CLOSED'])(
    'treats %s as retryable',
    (code) => {
      expect(isRetryableStorageError(pgError(code))).toBe(true);
    },
  );

  it('does not retry constraint or syntax errors', () => {
    expect(isRetryableStorageError(pgError('23505'))).toBe(false);
    expect(isRetryableStorageError(pgError('42601'))).toBe(false);
    expect(isRetryableStorageError(new Error('boom'))).toBe(false);
  });
});

describe('DuplicateKeyError', () => {
  it('carries the constraint name and cause', () => {
    const cause = pgError('23505', 'inventory_items_sku_idx');
    const err = new DuplicateKeyError('inventory_items_sku_idx', { cause });
    expect(err.name).toBe('DuplicateKeyError');
    expect(err.constraint).toBe('inventory_items_sku_idx');
    expect(err.cause).toBe(cause);
    expect(err.message).toBe('Duplicate key violates unique constraint "inventory_items_sku_idx"');
  });
});
