import { json } from 'itty-router';
import { logger } from './utils/logger';

export type ErrorKind =
  | 'validation'
  | 'permission'
  | 'not_found'
  | 'state'
  | 'window_expired'
  | 'integrity'
  | 'conflict';

/**
 * Base class for every failure the governance core reports to its callers.
 * `retryable` is true only for transient write conflicts.
 */
export abstract class GovernanceError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly status: number;
  readonly retryable: boolean = false;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends GovernanceError {
  readonly kind = 'validation';
  readonly status = 400;
}

export class PermissionError extends GovernanceError {
  readonly kind = 'permission';
  readonly status = 403;
}

export class NotFoundError extends GovernanceError {
  readonly kind = 'not_found';
  readonly status = 404;
}

export class StateError extends GovernanceError {
  readonly kind = 'state';
  readonly status = 409;
}

export class WindowExpiredError extends GovernanceError {
  readonly kind = 'window_expired';
  readonly status = 403;
}

export class IntegrityError extends GovernanceError {
  readonly kind = 'integrity';
  readonly status = 409;
}

export class ConflictError extends GovernanceError {
  readonly kind = 'conflict';
  readonly status = 503;
  readonly retryable = true;
}

const CONFLICT_CODES = new Set(['SQLITE_BUSY', 'SQLITE_BUSY_SNAPSHOT', 'SQLITE_LOCKED']);

export const isWriteConflict = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && typeof error.code === 'string' && CONFLICT_CODES.has(error.code);

// Converts anything thrown inside a route into the JSON error body the API returns
export const errorResponse = (error: unknown): Response => {
  if (error instanceof GovernanceError) {
    return json({ error: error.message, kind: error.kind }, { status: error.status });
  }
  if (isWriteConflict(error)) {
    logger.warn('Write conflict escaped the retry loop:', error);
    const conflict = new ConflictError('Concurrent update in progress; please retry');
    return json({ error: conflict.message, kind: conflict.kind }, { status: conflict.status });
  }

  logger.error('Unhandled error while processing request:', error);
  return json({ error: 'Internal server error', kind: 'internal' }, { status: 500 });
};
