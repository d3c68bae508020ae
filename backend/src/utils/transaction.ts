import { ConflictError, isWriteConflict } from '../errors';
import type { Env } from './sessionManager';
import { logger } from './logger';

export interface RetryOptions {
  attempts?: number;
  baseDelayMs?: number;
  label?: string;
}

const DEFAULT_ATTEMPTS = 5;
const DEFAULT_BASE_DELAY_MS = 10;

export { isWriteConflict };

const delay = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Runs `operation`, retrying with exponential backoff while it fails with a
 * SQLite write conflict. Any other failure propagates untouched.
 */
export async function retryOnConflict<T>(operation: () => T, options: RetryOptions = {}): Promise<T> {
  const attempts = options.attempts ?? DEFAULT_ATTEMPTS;
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const label = options.label ?? 'transaction';

  for (let attempt = 1; ; attempt++) {
    try {
      return operation();
    } catch (error) {
      if (!isWriteConflict(error)) {
        throw error;
      }
      if (attempt >= attempts) {
        logger.warn(`${label}: giving up after ${attempt} conflicting attempts`);
        throw new ConflictError(`Concurrent update in progress for ${label}; please retry`);
      }
      const wait = baseDelayMs * 2 ** (attempt - 1);
      logger.debug(`${label}: write conflict on attempt ${attempt}, retrying in ${wait}ms`);
      await delay(wait);
    }
  }
}

// BEGIN IMMEDIATE takes the write lock up front, so no two writers read the same counter value
export function runSerializable<T>(env: Env, work: () => T, options: RetryOptions = {}): Promise<T> {
  return retryOnConflict(() => env.DB.transaction(work).immediate(), options);
}
