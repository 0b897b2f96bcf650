/**
 * Database Migration Operations
 *
 * @module migrations/operations
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import { SCHEMA_VERSION } from './schema-definitions.js';
import {
  configurePragmas,
  createIndexes,
  createTables,
  initializeSchemaVersion,
} from './schema-helpers.js';

/**
 * Current schema version of the database, or 0 if not initialized
 */
export function checkSchemaVersion(db: Database.Database): number {
  try {
    const tableExists = db
      .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'`)
      .get();
    if (!tableExists) {
      return 0;
    }

    const row = db.prepare('SELECT version FROM schema_version WHERE id = ?').get(1) as
      | { version: number }
      | undefined;
    return row?.version ?? 0;
  } catch (error) {
    throw new MigrationError('Failed to check schema version', 'query', 'schema_version', error);
  }
}

export function getCurrentSchemaVersion(): number {
  return SCHEMA_VERSION;
}

/**
 * Initialize the database with all tables, indexes, and configuration.
 *
 * Idempotent. Table and index creation runs in one transaction and the
 * version is stamped last, so a crash mid-init leaves version 0 and the next
 * open re-initializes cleanly.
 */
export function initializeDatabase(db: Database.Database): void {
  configurePragmas(db);

  const initTransaction = db.transaction(() => {
    createTables(db);
    createIndexes(db);
    initializeSchemaVersion(db);
  });

  initTransaction();
}

/**
 * Bring an existing database to the current schema version.
 */
export function migrateToLatest(db: Database.Database): void {
  const currentVersion = checkSchemaVersion(db);

  if (currentVersion === 0) {
    initializeDatabase(db);
    return;
  }

  if (currentVersion > SCHEMA_VERSION) {
    throw new MigrationError(
      `Database schema version (${String(currentVersion)}) is newer than supported version (${String(SCHEMA_VERSION)}). ` +
        'Please update the application.',
      'version_check'
    );
  }

  // Version 1 is the first release; later versions add their steps here.
  configurePragmas(db);
}
