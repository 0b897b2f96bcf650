/**
 * Schema Verification
 *
 * @module migrations/verification
 */

import type Database from 'better-sqlite3';
import { REQUIRED_TABLES, REQUIRED_INDEXES } from './schema-definitions.js';

/**
 * Columns the writer depends on; missing ones mean a partial or foreign schema.
 */
const REQUIRED_COLUMNS: Record<string, string[]> = {
  documents: ['id', 'doc_reference_id', 'source_url', 'batch_id'],
  persons: ['id', 'name_key', 'confidence', 'confidence_rank', 'power_corroboration', 'victim_protected'],
  locations: ['id', 'name_key', 'confidence_rank'],
  person_relationships: ['person_a_id', 'person_b_id', 'co_occurrence_count', 'source_document_ids'],
  conflict_records: ['id', 'kind', 'document_a_id'],
  processing_log: ['id', 'document_id', 'tokens_used'],
};

export interface SchemaVerification {
  valid: boolean;
  missingTables: string[];
  missingIndexes: string[];
  missingColumns: string[];
}

export function verifySchema(db: Database.Database): SchemaVerification {
  const missingTables: string[] = [];
  const missingIndexes: string[] = [];
  const missingColumns: string[] = [];

  const lookup = db.prepare(`SELECT name FROM sqlite_master WHERE type = ? AND name = ?`);

  for (const tableName of REQUIRED_TABLES) {
    if (!lookup.get('table', tableName)) {
      missingTables.push(tableName);
    }
  }

  for (const indexName of REQUIRED_INDEXES) {
    if (!lookup.get('index', indexName)) {
      missingIndexes.push(indexName);
    }
  }

  for (const [table, requiredCols] of Object.entries(REQUIRED_COLUMNS)) {
    if (missingTables.includes(table)) continue;
    const columns = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
    const columnNames = new Set(columns.map((c) => c.name));
    for (const col of requiredCols) {
      if (!columnNames.has(col)) {
        missingColumns.push(`${table}.${col}`);
      }
    }
  }

  return {
    valid: missingTables.length === 0 && missingIndexes.length === 0 && missingColumns.length === 0,
    missingTables,
    missingIndexes,
    missingColumns,
  };
}
