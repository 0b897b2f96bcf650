/**
 * Shared types for storage services
 */

import type {
  ConfidenceLevel,
  ConflictInsert,
  DocumentRecord,
  DocumentUpsert,
  EventInsert,
  LocationRecord,
  LocationSummary,
  LocationUpsert,
  PersonRecord,
  PersonSummary,
  PersonUpsert,
  ProcessingLogInsert,
  RelationshipObservation,
  RelationshipRecord,
} from '../../models/index.js';

/**
 * What the record writer and context assembler need from durable storage:
 * natural-key upserts, plain inserts for the append-only tables, and
 * lookups by key. DatabaseService is the SQLite implementation.
 */
export interface RecordStore {
  /** Run fn atomically; a throw rolls back every write made inside it */
  transaction<T>(fn: () => T): T;

  upsertDocument(doc: DocumentUpsert): DocumentRecord;
  getDocumentByReference(reference: string): DocumentRecord | null;

  upsertPerson(person: PersonUpsert): PersonRecord;
  getPersonByKey(nameKey: string): PersonRecord | null;
  findPersonSummaries(nameKeys: string[]): PersonSummary[];
  linkPersonDocument(personId: string, documentId: string, confidence: ConfidenceLevel): void;

  upsertLocation(location: LocationUpsert): LocationRecord;
  findLocationSummaries(nameKeys: string[]): LocationSummary[];

  insertEvent(event: EventInsert): string;
  linkEventDocument(eventId: string, documentId: string, supportType?: string): void;
  linkEventPerson(eventId: string, personId: string, confidence: ConfidenceLevel): void;

  upsertRelationship(observation: RelationshipObservation): RelationshipRecord;

  insertConflict(conflict: ConflictInsert): string;
  insertProcessingLog(entry: ProcessingLogInsert): string;
}
