/**
 * Schema Helper Functions
 *
 * @module migrations/schema-helpers
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import {
  DATABASE_PRAGMAS,
  CREATE_SCHEMA_VERSION_TABLE,
  CREATE_INDEXES,
  TABLE_DEFINITIONS,
  SCHEMA_VERSION,
} from './schema-definitions.js';

/**
 * Configure database pragmas. Must run outside a transaction.
 */
export function configurePragmas(db: Database.Database): void {
  for (const pragma of DATABASE_PRAGMAS) {
    try {
      db.exec(pragma);
    } catch (error) {
      throw new MigrationError(`Failed to set pragma: ${pragma}`, 'pragma', undefined, error);
    }
  }
}

/**
 * Create the schema_version table and stamp the current version.
 * A stale version row is updated rather than kept.
 */
export function initializeSchemaVersion(db: Database.Database): void {
  try {
    db.exec(CREATE_SCHEMA_VERSION_TABLE);

    const now = new Date().toISOString();
    db.prepare(
      `
      INSERT INTO schema_version (id, version, created_at, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET version = excluded.version, updated_at = excluded.updated_at
    `
    ).run(1, SCHEMA_VERSION, now, now);
  } catch (error) {
    throw new MigrationError(
      'Failed to initialize schema version table',
      'create_table',
      'schema_version',
      error
    );
  }
}

export function createTables(db: Database.Database): void {
  for (const table of TABLE_DEFINITIONS) {
    try {
      db.exec(table.sql);
    } catch (error) {
      throw new MigrationError(
        `Failed to create table: ${table.name}`,
        'create_table',
        table.name,
        error
      );
    }
  }
}

export function createIndexes(db: Database.Database): void {
  for (const indexSql of CREATE_INDEXES) {
    try {
      db.exec(indexSql);
    } catch (error) {
      const match = /CREATE INDEX IF NOT EXISTS (\w+)/.exec(indexSql);
      const indexName = match ? match[1] : 'unknown';
      throw new MigrationError(`Failed to create index: ${indexName}`, 'create_index', indexName, error);
    }
  }
}
