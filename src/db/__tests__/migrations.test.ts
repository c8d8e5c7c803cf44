import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';
import { openDatabase } from '../index.js';
import { getSchemaVersion, migrate } from '../migrations.js';
import { MIGRATIONS, type Migration } from '../schema.js';
import { SchemaFault } from '../../utils/errors.js';

const LATEST = MIGRATIONS[MIGRATIONS.length - 1].version;

function tableExists(db: Database.Database, name: string): boolean {
  return db.prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?").get(name) !== undefined;
}

describe('migrate', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDatabase(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('brings an empty database to the latest version', () => {
    expect(migrate(db)).toBe(LATEST);
    expect(getSchemaVersion(db)).toBe(3);
    expect(tableExists(db, 'bookmark_tags')).toBe(true);
  });

  it('does nothing on a second run', () => {
    migrate(db);
    expect(migrate(db)).toBe(LATEST);
  });

  it('rolls back a failing migration and keeps the previous version', () => {
    const broken: Migration[] = [
      ...MIGRATIONS,
      {
        version: LATEST + 1,
        name: 'broken',
        up(conn) {
          conn.exec('CREATE TABLE half_done (id INTEGER)');
          conn.exec('INSERT INTO no_such_table VALUES (1)');
        },
      },
    ];

    let fault: unknown;
    try {
      migrate(db, broken);
    } catch (error) {
      fault = error;
    }

    expect(fault).toBeInstanceOf(SchemaFault);
    expect(fault instanceof SchemaFault && fault.version).toBe(LATEST + 1);
    expect(getSchemaVersion(db)).toBe(LATEST);
    expect(tableExists(db, 'half_done')).toBe(false);
  });

  it('rejects a list that is not strictly ascending', () => {
    const unordered: Migration[] = [MIGRATIONS[1], MIGRATIONS[0]];

    expect(() => migrate(db, unordered)).toThrow(SchemaFault);
    expect(getSchemaVersion(db)).toBe(0);
  });
});
