/**
 * Static operations for DatabaseService - database lifecycle: create, open, exists.
 */

import Database from 'better-sqlite3';
import { chmodSync, existsSync, mkdirSync, unlinkSync, writeFileSync } from 'fs';
import {
  configurePragmas,
  initializeDatabase,
  migrateToLatest,
  verifySchema,
} from '../migrations/index.js';
import { DatabaseError, DatabaseErrorCode } from './types.js';
import { DEFAULT_STORAGE_PATH, getDatabasePath, validateName } from './helpers.js';

export interface OpenedDatabase {
  db: Database.Database;
  name: string;
  path: string;
}

function removeQuietly(dbPath: string, reason: string): void {
  try {
    unlinkSync(dbPath);
  } catch (cleanupErr) {
    console.error(
      `[static-operations] Failed to clean up db file after ${reason}:`,
      cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr)
    );
  }
}

/**
 * Create a new database. The file is created 0600 inside a 0700 directory.
 *
 * @throws DatabaseError if name is invalid or database already exists
 */
export function createDatabase(name: string, storagePath?: string): OpenedDatabase {
  validateName(name);
  const basePath = storagePath ?? DEFAULT_STORAGE_PATH;
  const dbPath = getDatabasePath(name, storagePath);

  if (!existsSync(basePath)) {
    mkdirSync(basePath, { recursive: true, mode: 0o700 });
  }

  if (existsSync(dbPath)) {
    throw new DatabaseError(
      `Database "${name}" already exists at ${dbPath}`,
      DatabaseErrorCode.DATABASE_ALREADY_EXISTS
    );
  }

  writeFileSync(dbPath, '', { mode: 0o600 });
  chmodSync(dbPath, 0o600);

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    removeQuietly(dbPath, 'creation error');
    throw new DatabaseError(
      `Failed to create database "${name}": ${String(error)}`,
      DatabaseErrorCode.PERMISSION_DENIED,
      error
    );
  }

  try {
    initializeDatabase(db);
  } catch (error) {
    db.close();
    removeQuietly(dbPath, 'init error');
    throw error;
  }

  return { db, name, path: dbPath };
}

/**
 * Open an existing database, migrating and verifying its schema.
 *
 * @throws DatabaseError if database doesn't exist or schema is invalid
 */
export function openDatabase(name: string, storagePath?: string): OpenedDatabase {
  validateName(name);
  const dbPath = getDatabasePath(name, storagePath);

  if (!existsSync(dbPath)) {
    throw new DatabaseError(
      `Database "${name}" not found at ${dbPath}`,
      DatabaseErrorCode.DATABASE_NOT_FOUND
    );
  }

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    throw new DatabaseError(
      `Failed to open database "${name}": ${String(error)}`,
      DatabaseErrorCode.DATABASE_LOCKED,
      error
    );
  }

  // Pragmas are per-connection, not persistent
  try {
    configurePragmas(db);
    migrateToLatest(db);
  } catch (error) {
    db.close();
    throw error;
  }

  const verification = verifySchema(db);
  if (!verification.valid) {
    db.close();
    throw new DatabaseError(
      `Database schema verification failed. Missing tables: ${verification.missingTables.join(', ')}. Missing indexes: ${verification.missingIndexes.join(', ')}. Missing columns: ${verification.missingColumns.join(', ')}`,
      DatabaseErrorCode.SCHEMA_MISMATCH
    );
  }

  return { db, name, path: dbPath };
}

export function databaseExists(name: string, storagePath?: string): boolean {
  try {
    validateName(name);
  } catch (error) {
    console.error(
      '[static-operations] Invalid database name:',
      error instanceof Error ? error.message : String(error)
    );
    return false;
  }
  return existsSync(getDatabasePath(name, storagePath));
}
