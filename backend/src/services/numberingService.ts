import { Env } from '../utils/sessionManager';
import { IntegrityError } from '../errors';

// Identifiers stay three digits wide below this number, then widen
const WIDE_FORMAT_THRESHOLD = 1000;

export interface AssignedIdentifier {
  number: number;
  identifier: string;
}

export function formatIdentifier(prefix: string, n: number): string {
  const width = n < WIDE_FORMAT_THRESHOLD ? 3 : 4;
  return `${prefix}-${String(n).padStart(width, '0')}`;
}

/**
 * Mints the next document number. Must run inside the approval's
 * serializable transaction: the counter row is read and advanced in a single
 * statement while the write lock is held.
 */
export function assignNextIdentifier(env: Env): AssignedIdentifier {
  if (!env.DB.inTransaction) {
    throw new IntegrityError('Document numbers can only be assigned inside an approval transaction');
  }

  const row = env.DB.prepare<[], { value: number }>(
    'UPDATE document_counter SET value = value + 1 WHERE id = 1 RETURNING value'
  ).get();
  if (!row) {
    throw new IntegrityError('Document counter row is missing');
  }

  return { number: row.value, identifier: formatIdentifier(env.DOCUMENT_PREFIX, row.value) };
}

// Highest number handed out so far (0 before the first approval)
export function peekCurrentNumber(env: Env): number {
  const row = env.DB.prepare<[], { value: number }>('SELECT value FROM document_counter WHERE id = 1').get();
  return row?.value ?? 0;
}
