/**
 * Document operations for DatabaseService
 *
 * Documents are keyed by doc_reference_id. Reprocessing a URL updates the
 * existing row; a different URL hashing to a reference already on file is
 * refused rather than silently merged.
 */

import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';

import type { DocumentRecord, DocumentUpsert } from '../../../models/index.js';
import { rowToDocument } from './converters.js';
import { nowIso } from './helpers.js';
import { DatabaseError, DatabaseErrorCode, type DocumentRow } from './types.js';

/**
 * Insert or update a document by its derived reference.
 *
 * @throws DatabaseError DOCUMENT_REFERENCE_COLLISION when the reference is
 *   already held by a different source URL
 */
export function upsertDocument(db: Database.Database, doc: DocumentUpsert): DocumentRecord {
  const existing = db
    .prepare('SELECT source_url FROM documents WHERE doc_reference_id = ?')
    .get(doc.doc_reference_id) as { source_url: string } | undefined;

  if (existing && existing.source_url !== doc.source_url) {
    throw new DatabaseError(
      `Document reference ${doc.doc_reference_id} already belongs to a different source URL`,
      DatabaseErrorCode.DOCUMENT_REFERENCE_COLLISION
    );
  }

  const now = nowIso();
  const row = db
    .prepare(
      `
    INSERT INTO documents (
      id, doc_reference_id, source_url, source, document_type, document_date, date_precision,
      ocr_quality, has_encoding_artifacts, page_count, file_size_kb, content_type,
      redaction_status, batch_id, is_processed, processed_at, notes, requires_human_review,
      created_at, updated_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(doc_reference_id) DO UPDATE SET
      source = excluded.source,
      document_type = excluded.document_type,
      document_date = excluded.document_date,
      date_precision = excluded.date_precision,
      ocr_quality = excluded.ocr_quality,
      has_encoding_artifacts = excluded.has_encoding_artifacts,
      page_count = excluded.page_count,
      file_size_kb = excluded.file_size_kb,
      content_type = excluded.content_type,
      redaction_status = excluded.redaction_status,
      batch_id = excluded.batch_id,
      is_processed = excluded.is_processed,
      processed_at = excluded.processed_at,
      notes = excluded.notes,
      requires_human_review = excluded.requires_human_review,
      updated_at = excluded.updated_at
    RETURNING *
  `
    )
    .get(
      uuidv4(),
      doc.doc_reference_id,
      doc.source_url,
      doc.source,
      doc.document_type,
      doc.document_date,
      doc.date_precision,
      doc.ocr_quality,
      doc.has_encoding_artifacts ? 1 : 0,
      doc.page_count,
      doc.file_size_kb,
      doc.content_type,
      doc.redaction_status,
      doc.batch_id,
      doc.is_processed ? 1 : 0,
      doc.processed_at,
      doc.notes,
      doc.requires_human_review ? 1 : 0,
      now,
      now
    ) as DocumentRow;

  return rowToDocument(row);
}

export function getDocument(db: Database.Database, id: string): DocumentRecord | null {
  const row = db.prepare('SELECT * FROM documents WHERE id = ?').get(id) as DocumentRow | undefined;
  return row ? rowToDocument(row) : null;
}

export function getDocumentByReference(
  db: Database.Database,
  reference: string
): DocumentRecord | null {
  const row = db.prepare('SELECT * FROM documents WHERE doc_reference_id = ?').get(reference) as
    | DocumentRow
    | undefined;
  return row ? rowToDocument(row) : null;
}

export interface ListDocumentsOptions {
  batchId?: string;
  limit?: number;
  offset?: number;
}

export function listDocuments(
  db: Database.Database,
  options: ListDocumentsOptions = {}
): DocumentRecord[] {
  const limit = options.limit ?? 50;
  const offset = options.offset ?? 0;
  const rows = (
    options.batchId
      ? db
          .prepare('SELECT * FROM documents WHERE batch_id = ? ORDER BY created_at DESC LIMIT ? OFFSET ?')
          .all(options.batchId, limit, offset)
      : db.prepare('SELECT * FROM documents ORDER BY created_at DESC LIMIT ? OFFSET ?').all(limit, offset)
  ) as DocumentRow[];
  return rows.map(rowToDocument);
}
