/**
 * Database Module - Public API
 */

export { MigrationError } from '../migrations/index.js';

export type { DatabaseStats } from './types.js';
export { DatabaseErrorCode, DatabaseError } from './types.js';

export { DatabaseService } from './service.js';

export type { ListDocumentsOptions } from './document-operations.js';
export type { ListConflictsOptions } from './audit-operations.js';
export { orderPersonPair } from './relationship-operations.js';
export { DEFAULT_STORAGE_PATH } from './helpers.js';
