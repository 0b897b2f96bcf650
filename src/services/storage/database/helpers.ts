/**
 * Helper functions for DatabaseService: name validation, path resolution
 * and foreign key error handling.
 */

import type Database from 'better-sqlite3';
import { homedir } from 'os';
import { join } from 'path';
import { DatabaseError, DatabaseErrorCode } from './types.js';

/**
 * Default storage path for databases
 */
export const DEFAULT_STORAGE_PATH =
  process.env.CASEFILE_STORAGE_PATH || join(homedir(), '.casefile-radar', 'databases');

/**
 * Valid database name pattern: alphanumeric, underscores, hyphens
 */
const VALID_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

export function validateName(name: string): void {
  if (!name) {
    throw new DatabaseError('Database name is required', DatabaseErrorCode.INVALID_NAME);
  }
  if (!VALID_NAME_PATTERN.test(name)) {
    throw new DatabaseError(
      `Invalid database name "${name}". Only alphanumeric characters, underscores, and hyphens are allowed.`,
      DatabaseErrorCode.INVALID_NAME
    );
  }
}

export function getDatabasePath(name: string, storagePath?: string): string {
  return join(storagePath ?? DEFAULT_STORAGE_PATH, `${name}.db`);
}

/**
 * Run a statement, converting SQLite FK constraint failures to DatabaseError.
 *
 * @param context - Error context message (e.g., "linking person to document")
 */
export function runWithForeignKeyCheck(
  stmt: Database.Statement,
  params: unknown[],
  context: string
): Database.RunResult {
  try {
    return stmt.run(...params);
  } catch (error) {
    if (error instanceof Error && error.message.includes('FOREIGN KEY constraint failed')) {
      throw new DatabaseError(
        `Foreign key violation ${context}`,
        DatabaseErrorCode.FOREIGN_KEY_VIOLATION,
        error
      );
    }
    throw error;
  }
}

/** ISO 8601 timestamp for created_at / updated_at columns */
export function nowIso(): string {
  return new Date().toISOString();
}
