import type Database from 'better-sqlite3';
import { SchemaFault, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { MIGRATIONS, type Migration } from './schema.js';

const log = logger.scope('DB');

export function getSchemaVersion(db: Database.Database): number {
  db.exec('CREATE TABLE IF NOT EXISTS schema_version (version INTEGER NOT NULL)');
  const row = db.prepare<[], { version: number }>('SELECT version FROM schema_version LIMIT 1').get();
  if (!row) {
    db.prepare('INSERT INTO schema_version (version) VALUES (0)').run();
    return 0;
  }
  return row.version;
}

function assertOrdered(migrations: readonly Migration[]): void {
  let previous = 0;
  for (const migration of migrations) {
    if (migration.version <= previous) {
      throw new SchemaFault(
        migration.version,
        `Migration list is not strictly ascending at version ${migration.version} (${migration.name})`
      );
    }
    previous = migration.version;
  }
}

/**
 * Applies every pending migration in ascending order, each in its own
 * transaction together with the version bump. Returns the resulting version.
 */
export function migrate(db: Database.Database, migrations: readonly Migration[] = MIGRATIONS): number {
  assertOrdered(migrations);

  let current = getSchemaVersion(db);
  for (const migration of migrations) {
    if (migration.version <= current) continue;

    const apply = db.transaction(() => {
      migration.up(db);
      db.prepare('UPDATE schema_version SET version = ?').run(migration.version);
    });

    try {
      apply();
    } catch (error) {
      throw new SchemaFault(
        migration.version,
        `Migration ${migration.version} (${migration.name}) failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    log.debug(`Migration ${migration.version} applied: ${migration.name}`);
    current = migration.version;
  }
  return current;
}
