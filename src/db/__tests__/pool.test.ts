import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConnectionPool } from '../index.js';
import { ArticleStore } from '../../services/store.js';
import { StorageFault } from '../../utils/errors.js';
import { withRetry } from '../../utils/retry.js';

const INSERT_FEED = "INSERT INTO feeds (name, url, created_at) VALUES (?, ?, '2026-03-10T00:00:00.000Z')";

describe('ConnectionPool', () => {
  let dir: string;
  let pool: ConnectionPool;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'feedmind-pool-'));
    pool = new ConnectionPool(join(dir, 'pool.db'));
  });

  afterEach(() => {
    pool.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('opens one connection per lane and reuses it', () => {
    const lane = pool.lane(0);

    expect(lane).not.toBe(pool.primary);
    expect(pool.lane(0)).toBe(lane);
    expect(pool.lane(1)).not.toBe(lane);
  });

  it('shares the primary for an in-memory database', () => {
    const memory = new ConnectionPool(':memory:');

    expect(memory.lane(0)).toBe(memory.primary);
    memory.close();
  });

  describe('while the primary holds the write lock', () => {
    let lane: ArticleStore;

    beforeEach(() => {
      lane = new ArticleStore(pool.lane(0));
      pool.primary.exec('BEGIN IMMEDIATE');
      pool.primary.prepare(INSERT_FEED).run('Pending', 'https://example.com/pending.xml');
    });

    afterEach(() => {
      if (pool.primary.inTransaction) pool.primary.exec('ROLLBACK');
    });

    it('lets a lane read the last committed state', () => {
      expect(lane.listFeeds()).toEqual([]);

      pool.primary.exec('COMMIT');

      expect(lane.listFeeds().map((f) => f.name)).toEqual(['Pending']);
    });

    it('fails a second writer as busy after the retries', () => {
      let attempts = 0;
      let fault: unknown;
      try {
        withRetry(
          'insertFeed',
          () => {
            attempts++;
            pool.lane(0).prepare(INSERT_FEED).run('Other', 'https://example.com/other.xml');
          },
          { retries: 3, baseDelayMs: 1 }
        );
      } catch (error) {
        fault = error;
      }

      expect(fault).toBeInstanceOf(StorageFault);
      expect(fault).toMatchObject({ reason: 'busy' });
      expect(attempts).toBe(4);
    });

    it('surfaces the busy fault through the store', () => {
      const add = () => lane.addFeed({ name: 'Other', url: 'https://example.com/other.xml' });

      expect(add).toThrow(StorageFault);
      expect(add).toThrow('addFeed: database is locked');
    });
  });
});
