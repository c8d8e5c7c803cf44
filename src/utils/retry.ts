import Database from 'better-sqlite3';
import { StorageFault } from './errors.js';
import { logger } from './logger.js';

const log = logger.scope('DB');

export interface RetryPolicy {
  retries: number;
  baseDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { retries: 3, baseDelayMs: 20 };

const sleepCell = new Int32Array(new SharedArrayBuffer(4));

// better-sqlite3 是同步 API，退避只能同步等待
function sleepSync(ms: number): void {
  Atomics.wait(sleepCell, 0, 0, ms);
}

export function isContention(error: unknown): boolean {
  if (!(error instanceof Database.SqliteError)) return false;
  return error.code.startsWith('SQLITE_BUSY') || error.code.startsWith('SQLITE_LOCKED');
}

/**
 * Runs a synchronous store operation, retrying lock contention with exponential
 * backoff (20, 40, 80ms by default) before giving up with `StorageFault('busy')`.
 * Other SQLite errors are converted immediately.
 */
export function withRetry<T>(label: string, op: () => T, policy: RetryPolicy = DEFAULT_RETRY_POLICY): T {
  for (let attempt = 0; ; attempt++) {
    try {
      return op();
    } catch (error) {
      if (error instanceof StorageFault) throw error;

      if (isContention(error)) {
        if (attempt < policy.retries) {
          const delay = policy.baseDelayMs * 2 ** attempt;
          log.debug(`${label}: database busy, retry ${attempt + 1}/${policy.retries} in ${delay}ms`);
          sleepSync(delay);
          continue;
        }
        throw new StorageFault('busy', `${label}: database is locked`, { cause: error });
      }

      if (error instanceof Database.SqliteError) {
        const reason = error.code.startsWith('SQLITE_CONSTRAINT') ? 'constraint' : 'io';
        throw new StorageFault(reason, `${label}: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }
}
