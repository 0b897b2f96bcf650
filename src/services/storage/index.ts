/**
 * Storage Service Module
 *
 * Database initialization, migrations, and the RecordStore implementation.
 */

export {
  initializeDatabase,
  checkSchemaVersion,
  migrateToLatest,
  getCurrentSchemaVersion,
  verifySchema,
  MigrationError,
} from './migrations/index.js';

export {
  DatabaseService,
  DatabaseError,
  DatabaseErrorCode,
  DEFAULT_STORAGE_PATH,
  orderPersonPair,
  type DatabaseStats,
  type ListDocumentsOptions,
  type ListConflictsOptions,
} from './database/index.js';

export type { RecordStore } from './types.js';
