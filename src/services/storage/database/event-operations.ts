/**
 * Event operations for DatabaseService
 *
 * Events are observations and are never deduplicated: every insert is a
 * new row. Their links to documents and persons are idempotent.
 */

import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';

import type { ConfidenceLevel, EventInsert, EventRecord } from '../../../models/index.js';
import { rowToEvent } from './converters.js';
import { nowIso, runWithForeignKeyCheck } from './helpers.js';
import type { EventRow } from './types.js';

export function insertEvent(db: Database.Database, event: EventInsert): string {
  const id = uuidv4();
  const stmt = db.prepare(`
    INSERT INTO events (
      id, event_type, title, event_date, date_precision, confidence,
      primary_location_id, upgrade_gap_note, notes, created_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  runWithForeignKeyCheck(
    stmt,
    [
      id,
      event.event_type,
      event.title,
      event.event_date,
      event.date_precision,
      event.confidence,
      event.primary_location_id,
      event.upgrade_gap_note,
      event.notes,
      nowIso(),
    ],
    `inserting event: location ${event.primary_location_id ?? '(none)'} does not exist`
  );
  return id;
}

export function linkEventDocument(
  db: Database.Database,
  eventId: string,
  documentId: string,
  supportType: string = 'primary_proof'
): void {
  const stmt = db.prepare(`
    INSERT INTO event_documents (id, event_id, document_id, support_type, created_at)
    VALUES (?, ?, ?, ?, ?)
    ON CONFLICT(event_id, document_id) DO UPDATE SET support_type = excluded.support_type
  `);
  runWithForeignKeyCheck(
    stmt,
    [uuidv4(), eventId, documentId, supportType, nowIso()],
    `linking event ${eventId} to document ${documentId}`
  );
}

export function linkEventPerson(
  db: Database.Database,
  eventId: string,
  personId: string,
  confidence: ConfidenceLevel
): void {
  const stmt = db.prepare(`
    INSERT INTO event_persons (id, event_id, person_id, confidence, created_at)
    VALUES (?, ?, ?, ?, ?)
    ON CONFLICT(event_id, person_id) DO UPDATE SET confidence = excluded.confidence
  `);
  runWithForeignKeyCheck(
    stmt,
    [uuidv4(), eventId, personId, confidence, nowIso()],
    `linking event ${eventId} to person ${personId}`
  );
}

export function getEventsByDocument(db: Database.Database, documentId: string): EventRecord[] {
  const rows = db
    .prepare(
      `
    SELECT e.* FROM events e
    JOIN event_documents ed ON ed.event_id = e.id
    WHERE ed.document_id = ?
    ORDER BY e.created_at, e.rowid
  `
    )
    .all(documentId) as EventRow[];
  return rows.map(rowToEvent);
}

/** Person ids linked to an event */
export function getEventPersonIds(db: Database.Database, eventId: string): string[] {
  const rows = db
    .prepare('SELECT person_id FROM event_persons WHERE event_id = ? ORDER BY rowid')
    .all(eventId) as Array<{ person_id: string }>;
  return rows.map((r) => r.person_id);
}
