/**
 * Audit operations for DatabaseService: conflict records and the
 * processing log. Both tables are append-only; nothing here updates or
 * deletes.
 */

import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';

import type {
  ConflictInsert,
  ConflictKind,
  ConflictRecord,
  ProcessingLogEntry,
  ProcessingLogInsert,
} from '../../../models/index.js';
import { rowToConflict, rowToProcessingLog } from './converters.js';
import { nowIso, runWithForeignKeyCheck } from './helpers.js';
import type { ConflictRow, ProcessingLogRow } from './types.js';

export function insertConflict(db: Database.Database, conflict: ConflictInsert): string {
  const id = uuidv4();
  const stmt = db.prepare(`
    INSERT INTO conflict_records (
      id, kind, entity_type, conflict_field, document_a_id,
      document_a_claim, document_b_claim, requires_human_review, created_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  runWithForeignKeyCheck(
    stmt,
    [
      id,
      conflict.kind,
      conflict.entity_type,
      conflict.conflict_field,
      conflict.document_a_id,
      conflict.document_a_claim,
      conflict.document_b_claim,
      conflict.requires_human_review ? 1 : 0,
      nowIso(),
    ],
    `inserting conflict: document ${conflict.document_a_id} does not exist`
  );
  return id;
}

export interface ListConflictsOptions {
  kind?: ConflictKind;
  documentId?: string;
  limit?: number;
}

/** Newest first */
export function listConflicts(
  db: Database.Database,
  options: ListConflictsOptions = {}
): ConflictRecord[] {
  const clauses: string[] = [];
  const params: Array<string | number> = [];
  if (options.kind) {
    clauses.push('kind = ?');
    params.push(options.kind);
  }
  if (options.documentId) {
    clauses.push('document_a_id = ?');
    params.push(options.documentId);
  }
  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
  params.push(options.limit ?? 100);

  const rows = db
    .prepare(`SELECT * FROM conflict_records ${where} ORDER BY created_at DESC, rowid DESC LIMIT ?`)
    .all(...params) as ConflictRow[];
  return rows.map(rowToConflict);
}

export function insertProcessingLog(db: Database.Database, entry: ProcessingLogInsert): string {
  const id = uuidv4();
  const stmt = db.prepare(`
    INSERT INTO processing_log (
      id, document_id, batch_id, agent_name, status, persons_extracted, locations_extracted,
      events_created, relationships_written, conflicts_flagged, victim_flags, model_used,
      tokens_used, processing_ms, started_at, completed_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  runWithForeignKeyCheck(
    stmt,
    [
      id,
      entry.document_id,
      entry.batch_id,
      entry.agent_name,
      entry.status,
      entry.persons_extracted,
      entry.locations_extracted,
      entry.events_created,
      entry.relationships_written,
      entry.conflicts_flagged,
      entry.victim_flags,
      entry.model_used,
      entry.tokens_used,
      entry.processing_ms,
      entry.started_at,
      entry.completed_at,
    ],
    `inserting processing log: document ${entry.document_id} does not exist`
  );
  return id;
}

export function listProcessingLog(
  db: Database.Database,
  documentId?: string
): ProcessingLogEntry[] {
  const rows = (
    documentId
      ? db.prepare('SELECT * FROM processing_log WHERE document_id = ? ORDER BY rowid').all(documentId)
      : db.prepare('SELECT * FROM processing_log ORDER BY rowid').all()
  ) as ProcessingLogRow[];
  return rows.map(rowToProcessingLog);
}
