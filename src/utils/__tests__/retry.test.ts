import { describe, expect, it, vi } from 'vitest';
import Database from 'better-sqlite3';
import { withRetry } from '../retry.js';
import { StorageFault } from '../errors.js';

const FAST = { retries: 3, baseDelayMs: 1 };

function sqliteError(code: string): InstanceType<Database.SqliteError> {
  return new Database.SqliteError(`${code} raised`, code);
}

describe('withRetry', () => {
  it('returns the result of a successful operation', () => {
    expect(withRetry('op', () => 42, FAST)).toBe(42);
  });

  it('retries while the database is busy', () => {
    let calls = 0;
    const result = withRetry(
      'op',
      () => {
        calls++;
        if (calls < 3) throw sqliteError('SQLITE_BUSY');
        return 'ok';
      },
      FAST
    );

    expect(result).toBe('ok');
    expect(calls).toBe(3);
  });

  it('gives up with a busy fault after the last retry', () => {
    const op = vi.fn(() => {
      throw sqliteError('SQLITE_LOCKED');
    });

    let fault: unknown;
    try {
      withRetry('op', op, FAST);
    } catch (error) {
      fault = error;
    }

    expect(op).toHaveBeenCalledTimes(4);
    expect(fault).toBeInstanceOf(StorageFault);
    expect(fault instanceof StorageFault && fault.reason).toBe('busy');
  });

  it('maps other SQLite errors without retrying', () => {
    const op = vi.fn(() => {
      throw sqliteError('SQLITE_CONSTRAINT_UNIQUE');
    });

    expect(() => withRetry('op', op, FAST)).toThrow(expect.objectContaining({ reason: 'constraint' }));
    expect(op).toHaveBeenCalledTimes(1);

    const io = () => {
      throw sqliteError('SQLITE_IOERR');
    };
    expect(() => withRetry('op', io, FAST)).toThrow(expect.objectContaining({ reason: 'io' }));
  });

  it('passes other errors through', () => {
    expect(() =>
      withRetry('op', () => {
        throw new TypeError('bad input');
      })
    ).toThrow(TypeError);
  });
});
