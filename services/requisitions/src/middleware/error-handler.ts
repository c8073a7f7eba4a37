import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { createLogger } from '@stockroom/config';
import { DuplicateKeyError, isRetryableStorageError } from '@stockroom/db';
import type { ErrorCode, ErrorResponseBody, ValidationErrorCode } from '@stockroom/shared-types';

const log = createLogger('requisitions:errors');

function defaultCode(statusCode: number): ErrorCode {
  switch (statusCode) {
    case 400:
      return 'INVALID_REQUEST';
    case 401:
      return 'UNAUTHORIZED';
    case 403:
      return 'FORBIDDEN';
    case 404:
      return 'NOT_FOUND';
    case 409:
      return 'INVALID_STATE_TRANSITION';
    case 503:
      return 'STORAGE_FAILURE';
    default:
      return 'INTERNAL_ERROR';
  }
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;

  constructor(
    public readonly statusCode: number,
    message: string,
    code?: ErrorCode,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'AppError';
    this.code = code ?? defaultCode(statusCode);
    this.retryable = statusCode === 503;
  }
}

// ─── Domain Errors ────────────────────────────────────────────────────

/** Bad input, rejected before anything is written. */
export class ValidationError extends AppError {
  constructor(code: ValidationErrorCode, message: string, details?: Record<string, unknown>) {
    super(400, message, code, details);
    this.name = 'ValidationError';
  }
}

/** The requisition is no longer in the state the caller assumed. */
export class StateConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(409, message, 'INVALID_STATE_TRANSITION', details);
    this.name = 'StateConflictError';
  }
}

/** Lock timeout, deadlock or lost connection; nothing was committed. */
export class StorageFailureError extends AppError {
  constructor(message = 'Storage is temporarily unavailable, retry the request', options?: ErrorOptions) {
    super(503, message, 'STORAGE_FAILURE', undefined, options);
    this.name = 'StorageFailureError';
  }
}

export class CodeGenerationFailedError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(503, message, 'CODE_GENERATION_FAILED', details);
    this.name = 'CodeGenerationFailedError';
  }
}

export function notFound(entity: string, id: string): AppError {
  return new AppError(404, `${entity} not found`, 'NOT_FOUND', { id });
}

// ─── Express Handler ──────────────────────────────────────────────────

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

function send(res: Response, status: number, body: ErrorResponseBody): void {
  res.status(status).json(body);
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      log.warn({ err, path: req.path, code: err.code }, err.message);
    }
    send(res, err.statusCode, {
      error: err.message,
      code: err.code,
      ...(err.details && { details: err.details }),
      ...(err.retryable && { retryable: true }),
    });
    return;
  }

  if (err instanceof ZodError) {
    send(res, 400, {
      error: 'Validation error',
      code: 'INVALID_REQUEST',
      details: err.flatten(),
    });
    return;
  }

  if (isBodyParseError(err)) {
    send(res, 400, { error: 'Malformed JSON body', code: 'INVALID_REQUEST' });
    return;
  }

  if (err instanceof DuplicateKeyError) {
    send(res, 409, {
      error: 'A record with the same unique value already exists',
      code: 'DUPLICATE_REFERENCE',
      details: { constraint: err.constraint },
    });
    return;
  }

  if (isRetryableStorageError(err)) {
    log.warn({ err, path: req.path }, 'Storage failure');
    send(res, 503, {
      error: 'Storage is temporarily unavailable, retry the request',
      code: 'STORAGE_FAILURE',
      retryable: true,
    });
    return;
  }

  log.error({ err, path: req.path, method: req.method }, 'Unhandled error');
  send(res, 500, { error: 'Internal server error', code: 'INTERNAL_ERROR' });
}
