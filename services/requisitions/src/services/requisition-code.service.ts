import { createLogger } from '@stockroom/config';
import { DuplicateKeyError, UNIQUE_CONSTRAINTS, type RequisitionStoreTx } from '@stockroom/db';
import { REQUISITION_CODE_PATTERN, REQUISITION_CODE_PREFIX } from '@stockroom/shared-types';
import { CodeGenerationFailedError } from '../middleware/error-handler.js';

const log = createLogger('requisition-code');

export const MAX_DAILY_SEQUENCE = 9999;

/**
 * Calendar day of `at` in `timeZone`, as YYYYMMDD. Every requisition uses
 * the one configured zone, never the caller's.
 */
export function formatCodeDay(at: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(at);

  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '';
  return `${part('year')}${part('month')}${part('day')}`;
}

export function formatRequisitionCode(day: string, sequence: number): string {
  return `${REQUISITION_CODE_PREFIX}-${day}-${String(sequence).padStart(4, '0')}`;
}

export function parseRequisitionCode(code: string): { day: string; sequence: number } | null {
  const match = REQUISITION_CODE_PATTERN.exec(code);
  if (!match) return null;
  return { day: match[1], sequence: Number.parseInt(match[2], 10) };
}

/**
 * Generate the next code for `day` from the per-day counter.
 * Format: REQ-YYYYMMDD-NNNN
 *
 * The counter row stays locked until `tx` ends, so concurrent creations on
 * the same day queue behind each other, and a rolled-back creation gives
 * its number back.
 */
export async function nextRequisitionCode(tx: RequisitionStoreTx, day: string): Promise<string> {
  const sequence = await tx.nextCodeSequence(day);
  if (sequence > MAX_DAILY_SEQUENCE) {
    throw new CodeGenerationFailedError(`Daily requisition limit of ${MAX_DAILY_SEQUENCE} reached for ${day}`, {
      day,
    });
  }
  return formatRequisitionCode(day, sequence);
}

/**
 * Run `insert` with fresh codes until one is accepted by the unique index on
 * requisitions.code, at most `maxAttempts` times. A collision means the
 * counter fell behind existing rows; each retry takes the next number.
 */
export async function withUniqueRequisitionCode<T>(
  tx: RequisitionStoreTx,
  day: string,
  maxAttempts: number,
  insert: (code: string) => Promise<T>,
): Promise<T> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const code = await nextRequisitionCode(tx, day);
    try {
      return await insert(code);
    } catch (err) {
      if (!(err instanceof DuplicateKeyError) || err.constraint !== UNIQUE_CONSTRAINTS.requisitionCode) {
        throw err;
      }
      log.warn({ code, attempt, maxAttempts }, 'Requisition code already taken, retrying');
    }
  }

  throw new CodeGenerationFailedError(`Could not allocate a requisition code after ${maxAttempts} attempts`, {
    day,
    attempts: maxAttempts,
  });
}
