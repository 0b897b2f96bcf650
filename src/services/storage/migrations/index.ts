/**
 * Database Schema Migrations
 *
 * SQLite schema initialization and version tracking (better-sqlite3).
 * All SQL uses parameterized queries via db.prepare().
 *
 * @module migrations
 */

export { MigrationError } from './types.js';

export {
  initializeDatabase,
  migrateToLatest,
  checkSchemaVersion,
  getCurrentSchemaVersion,
} from './operations.js';

export { configurePragmas } from './schema-helpers.js';

export { verifySchema, type SchemaVerification } from './verification.js';
