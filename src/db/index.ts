import Database from 'better-sqlite3';
import { homedir } from 'os';
import { join } from 'path';
import { chmodSync, existsSync, mkdirSync } from 'fs';
import { migrate } from './migrations.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const DATA_DIR = process.env.FEEDMIND_HOME || join(homedir(), '.feedmind');
const DB_PATH = join(DATA_DIR, 'feedmind.db');

const MEMORY = ':memory:';

export function openDatabase(path: string): Database.Database {
  const db = new Database(path, { timeout: 0 });
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  // 锁竞争由 withRetry 退避处理，这里不让 SQLite 自己阻塞等待
  db.pragma('busy_timeout = 0');
  return db;
}

/**
 * One primary connection for the consumer plus a private connection per
 * worker lane, all on the same WAL file. The schema is migrated on the
 * primary before any lane connection is opened.
 */
export class ConnectionPool {
  readonly primary: Database.Database;
  private readonly lanes = new Map<number, Database.Database>();

  constructor(readonly path: string) {
    this.primary = openDatabase(path);
    try {
      migrate(this.primary);
    } catch (error) {
      this.primary.close();
      throw error;
    }
    if (path !== MEMORY) {
      try {
        chmodSync(path, 0o600);
      } catch (error) {
        logger.debug(`Could not restrict permissions on ${path}: ${errorMessage(error)}`);
      }
    }
  }

  lane(index: number): Database.Database {
    // 内存库无法跨连接共享，所有 lane 复用主连接
    if (this.path === MEMORY) return this.primary;

    let db = this.lanes.get(index);
    if (!db) {
      db = openDatabase(this.path);
      this.lanes.set(index, db);
    }
    return db;
  }

  close(): void {
    for (const db of this.lanes.values()) {
      db.close();
    }
    this.lanes.clear();
    if (this.primary.open) {
      this.primary.close();
    }
  }
}

let pool: ConnectionPool | null = null;

export function getPool(): ConnectionPool {
  if (!pool) {
    if (!existsSync(DATA_DIR)) {
      mkdirSync(DATA_DIR, { recursive: true });
    }
    pool = new ConnectionPool(DB_PATH);
  }
  return pool;
}

export function getDb(): Database.Database {
  return getPool().primary;
}

export function closeDb(): void {
  if (pool) {
    pool.close();
    pool = null;
  }
}

export { DB_PATH, DATA_DIR };
