/**
 * DatabaseService: the SQLite implementation of RecordStore.
 *
 * Thin class over the per-domain operation modules. Uses prepared
 * statements throughout; natural-key upserts rely on SQLite's
 * ON CONFLICT ... DO UPDATE so each one is a single atomic statement.
 */

import type Database from 'better-sqlite3';

import type {
  ConfidenceLevel,
  ConflictInsert,
  ConflictRecord,
  DocumentRecord,
  DocumentUpsert,
  EventInsert,
  EventRecord,
  LocationRecord,
  LocationSummary,
  LocationUpsert,
  PersonRecord,
  PersonSummary,
  PersonUpsert,
  ProcessingLogEntry,
  ProcessingLogInsert,
  RelationshipObservation,
  RelationshipRecord,
} from '../../../models/index.js';
import type { RecordStore } from '../types.js';
import type { DatabaseStats } from './types.js';
import { createDatabase, databaseExists, openDatabase } from './static-operations.js';
import { getStats } from './stats-operations.js';
import * as docOps from './document-operations.js';
import * as personOps from './person-operations.js';
import * as locationOps from './location-operations.js';
import * as eventOps from './event-operations.js';
import * as relOps from './relationship-operations.js';
import * as auditOps from './audit-operations.js';

export class DatabaseService implements RecordStore {
  private readonly db: Database.Database;
  private readonly name: string;
  private readonly path: string;

  private constructor(db: Database.Database, name: string, path: string) {
    this.db = db;
    this.name = name;
    this.path = path;
  }

  static create(name: string, storagePath?: string): DatabaseService {
    const result = createDatabase(name, storagePath);
    return new DatabaseService(result.db, result.name, result.path);
  }

  static open(name: string, storagePath?: string): DatabaseService {
    const result = openDatabase(name, storagePath);
    return new DatabaseService(result.db, result.name, result.path);
  }

  /** Open the named database, creating it on first use */
  static openOrCreate(name: string, storagePath?: string): DatabaseService {
    return databaseExists(name, storagePath)
      ? DatabaseService.open(name, storagePath)
      : DatabaseService.create(name, storagePath);
  }

  static exists(name: string, storagePath?: string): boolean {
    return databaseExists(name, storagePath);
  }

  getStats(): DatabaseStats {
    return getStats(this.db, this.name, this.path);
  }

  close(): void {
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error(
        '[DatabaseService] pragma optimize failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    this.db.close();
  }

  getName(): string {
    return this.name;
  }

  getPath(): string {
    return this.path;
  }

  /**
   * better-sqlite3 transactions nest as savepoints, so a writer transaction
   * inside a caller's transaction is fine.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  getConnection(): Database.Database {
    return this.db;
  }

  // ==================== DOCUMENT OPERATIONS ====================

  upsertDocument(doc: DocumentUpsert): DocumentRecord {
    return docOps.upsertDocument(this.db, doc);
  }

  getDocument(id: string): DocumentRecord | null {
    return docOps.getDocument(this.db, id);
  }

  getDocumentByReference(reference: string): DocumentRecord | null {
    return docOps.getDocumentByReference(this.db, reference);
  }

  listDocuments(options?: docOps.ListDocumentsOptions): DocumentRecord[] {
    return docOps.listDocuments(this.db, options);
  }

  // ==================== PERSON OPERATIONS ====================

  upsertPerson(person: PersonUpsert): PersonRecord {
    return personOps.upsertPerson(this.db, person);
  }

  getPerson(id: string): PersonRecord | null {
    return personOps.getPerson(this.db, id);
  }

  getPersonByKey(nameKey: string): PersonRecord | null {
    return personOps.getPersonByKey(this.db, nameKey);
  }

  findPersonSummaries(nameKeys: string[]): PersonSummary[] {
    return personOps.findPersonSummaries(this.db, nameKeys);
  }

  linkPersonDocument(personId: string, documentId: string, confidence: ConfidenceLevel): void {
    personOps.linkPersonDocument(this.db, personId, documentId, confidence);
  }

  countPersonDocuments(personId: string): number {
    return personOps.countPersonDocuments(this.db, personId);
  }

  // ==================== LOCATION OPERATIONS ====================

  upsertLocation(location: LocationUpsert): LocationRecord {
    return locationOps.upsertLocation(this.db, location);
  }

  getLocationByKey(nameKey: string): LocationRecord | null {
    return locationOps.getLocationByKey(this.db, nameKey);
  }

  findLocationSummaries(nameKeys: string[]): LocationSummary[] {
    return locationOps.findLocationSummaries(this.db, nameKeys);
  }

  // ==================== EVENT OPERATIONS ====================

  insertEvent(event: EventInsert): string {
    return eventOps.insertEvent(this.db, event);
  }

  linkEventDocument(eventId: string, documentId: string, supportType?: string): void {
    eventOps.linkEventDocument(this.db, eventId, documentId, supportType);
  }

  linkEventPerson(eventId: string, personId: string, confidence: ConfidenceLevel): void {
    eventOps.linkEventPerson(this.db, eventId, personId, confidence);
  }

  getEventsByDocument(documentId: string): EventRecord[] {
    return eventOps.getEventsByDocument(this.db, documentId);
  }

  getEventPersonIds(eventId: string): string[] {
    return eventOps.getEventPersonIds(this.db, eventId);
  }

  // ==================== RELATIONSHIP OPERATIONS ====================

  upsertRelationship(observation: RelationshipObservation): RelationshipRecord {
    return relOps.upsertRelationship(this.db, observation);
  }

  getRelationship(personId1: string, personId2: string): RelationshipRecord | null {
    return relOps.getRelationship(this.db, personId1, personId2);
  }

  listRelationshipsForPerson(personId: string): RelationshipRecord[] {
    return relOps.listRelationshipsForPerson(this.db, personId);
  }

  // ==================== AUDIT OPERATIONS ====================

  insertConflict(conflict: ConflictInsert): string {
    return auditOps.insertConflict(this.db, conflict);
  }

  listConflicts(options?: auditOps.ListConflictsOptions): ConflictRecord[] {
    return auditOps.listConflicts(this.db, options);
  }

  insertProcessingLog(entry: ProcessingLogInsert): string {
    return auditOps.insertProcessingLog(this.db, entry);
  }

  listProcessingLog(documentId?: string): ProcessingLogEntry[] {
    return auditOps.listProcessingLog(this.db, documentId);
  }
}
