/**
 * Unit tests for the record writer
 *
 * @module tests/unit/pipeline/writer
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import {
  DecisionResultSchema,
  ExtractionResultSchema,
  VerificationResultSchema,
  type DecisionResult,
  type ExtractionResult,
  type VerificationResult,
} from '../../../src/models/index.js';
import { writeRecords, type WriteInput } from '../../../src/services/pipeline/index.js';
import { eventTitle, VICTIM_DIVERSION_CLAIM } from '../../../src/services/pipeline/writer.js';
import type { DatabaseService } from '../../../src/services/storage/index.js';
import { deriveDocumentReference } from '../../../src/utils/hash.js';
import {
  cleanupTestDir,
  createTestConfig,
  createTestDatabase,
  createTestDir,
  makeDocument,
  manifestDecision,
  manifestExtraction,
  manifestVerification,
  TEST_MODELS,
} from '../helpers.js';

const config = createTestConfig();
const URL = 'https://records.example.test/manifest-001.pdf';

function writeInput(
  overrides: {
    extraction?: ExtractionResult;
    verification?: VerificationResult;
    decision?: DecisionResult;
  } = {}
): WriteInput {
  return {
    document: makeDocument({ url: URL }),
    batchId: 'test-batch',
    extraction: overrides.extraction ?? manifestExtraction(),
    verification: overrides.verification ?? manifestVerification(),
    decision: overrides.decision ?? manifestDecision(),
    models: TEST_MODELS,
    tokensUsed: 45,
    processingMs: 12,
    startedAt: '2024-01-01T00:00:00.000Z',
  };
}

describe('writeRecords', () => {
  let dir: string;
  let db: DatabaseService;

  beforeEach(() => {
    dir = createTestDir('writer-');
    db = createTestDatabase(dir);
  });

  afterEach(() => {
    db.close();
    cleanupTestDir(dir);
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // FLIGHT MANIFEST
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('flight manifest', () => {
    it('returns the write counts', () => {
      const summary = writeRecords(db, writeInput(), config);

      expect(summary).toEqual({
        documentId: expect.any(String),
        documentReference: deriveDocumentReference(URL),
        personsWritten: 2,
        locationsWritten: 2,
        eventsCreated: 1,
        eventPersonLinks: 2,
        relationshipsWritten: 1,
        relationshipsSkipped: 2,
        conflictsLogged: 1,
        victimFlags: 1,
        tokensUsed: 45,
      });
    });

    it('writes the document row', () => {
      const { documentId } = writeRecords(db, writeInput(), config);

      expect(db.getDocument(documentId)).toMatchObject({
        source_url: URL,
        source: 'doj_release',
        document_type: 'flight_manifest',
        document_date: '2002-03-14',
        date_precision: 'exact',
        redaction_status: 'none',
        batch_id: 'test-batch',
        is_processed: true,
        notes: 'Manifest is legible; passengers listed by name.',
        requires_human_review: false,
      });
    });

    it('diverts the flagged passenger instead of writing a person', () => {
      const { documentId } = writeRecords(db, writeInput(), config);

      expect(db.getPersonByKey('jane doe')).toBeNull();
      const diversions = db.listConflicts({ kind: 'victim_diversion' });
      expect(diversions).toHaveLength(1);
      expect(diversions[0]).toMatchObject({
        entity_type: 'person',
        conflict_field: 'victim_flag',
        document_a_id: documentId,
        document_a_claim: 'Possible victim: Jane Doe',
        document_b_claim: VICTIM_DIVERSION_CLAIM,
        requires_human_review: true,
      });
    });

    it('writes persons with verification confidence and decision scores', () => {
      writeRecords(db, writeInput(), config);

      expect(db.getPersonByKey('john smith')).toMatchObject({
        full_name: 'John Smith',
        confidence: 'indicated',
        power_corroboration: 40,
        power_public_profile: 40,
        power_institutional: 30,
        power_network_centrality: 20,
        upgrade_gap_note: 'Needs a second independent document',
        flagged_for_review: false,
      });
      expect(db.getPersonByKey('robert hale')).toMatchObject({
        confidence: 'confirmed',
        power_corroboration: 90,
        power_public_profile: null,
        category: 'other',
        flagged_for_review: true,
      });
    });

    it('writes the event with its location and non-diverted passengers', () => {
      const { documentId } = writeRecords(db, writeInput(), config);

      const events = db.getEventsByDocument(documentId);
      expect(events).toHaveLength(1);
      const [event] = events;
      expect(event).toMatchObject({
        event_type: 'flight',
        title: 'Flight from Palm Beach to Teterboro',
        event_date: '2002-03-14',
        confidence: 'indicated',
        primary_location_id: db.getLocationByKey('palm beach')?.id,
        upgrade_gap_note: 'Needs a matching pilot log',
        notes: 'Single manifest page',
      });
      expect(db.getEventPersonIds(event?.id ?? '')).toEqual([
        db.getPersonByKey('john smith')?.id,
        db.getPersonByKey('robert hale')?.id,
      ]);
    });

    it('writes the adult pair and skips the diverted and self pairs', () => {
      const { documentId } = writeRecords(db, writeInput(), config);
      const john = db.getPersonByKey('john smith');
      const robert = db.getPersonByKey('robert hale');

      const relationship = db.getRelationship(john?.id ?? '', robert?.id ?? '');
      expect(relationship).toMatchObject({
        relationship_type: 'co_traveler',
        evidence_strength: 'weak',
        co_occurrence_count: 1,
        source_document_ids: [documentId],
        notes: 'Same flight',
      });
      expect(db.listRelationshipsForPerson(john?.id ?? '')).toHaveLength(1);
    });

    it('logs claim conflicts and the processing run', () => {
      const { documentId } = writeRecords(db, writeInput(), config);

      expect(db.listConflicts({ kind: 'claim_conflict' })).toEqual([
        expect.objectContaining({
          entity_type: 'date',
          conflict_field: 'flight_date',
          document_a_claim: '2002-03-14',
          document_b_claim: '2002-03-15',
        }),
      ]);
      expect(db.listProcessingLog(documentId)).toEqual([
        expect.objectContaining({
          batch_id: 'test-batch',
          agent_name: 'full_pipeline',
          status: 'complete',
          persons_extracted: 2,
          locations_extracted: 2,
          events_created: 1,
          relationships_written: 1,
          conflicts_flagged: 1,
          victim_flags: 1,
          model_used: 'test-extract,test-verify,test-decide',
          tokens_used: 45,
          processing_ms: 12,
          started_at: '2024-01-01T00:00:00.000Z',
        }),
      ]);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // REPROCESSING
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('reprocessing the same document', () => {
    it('updates keyed rows and appends observations', () => {
      const first = writeRecords(db, writeInput(), config);
      const second = writeRecords(db, writeInput(), config);

      expect(second.documentId).toBe(first.documentId);
      const john = db.getPersonByKey('john smith');
      const robert = db.getPersonByKey('robert hale');
      expect(db.countPersonDocuments(john?.id ?? '')).toBe(1);

      const relationship = db.getRelationship(john?.id ?? '', robert?.id ?? '');
      expect(relationship?.co_occurrence_count).toBe(1);
      expect(relationship?.source_document_ids).toEqual([first.documentId]);

      expect(db.getStats()).toMatchObject({
        total_documents: 1,
        total_persons: 2,
        total_locations: 2,
        total_events: 2,
        total_relationships: 1,
        total_conflicts: 4,
        victim_diversions: 2,
        total_processing_runs: 2,
        total_tokens_used: 90,
      });
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // PROTECTION AND EDGE CASES
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('protection', () => {
    it('diverts a lexicon match the stages did not flag', () => {
      const base = manifestVerification();
      const verification = VerificationResultSchema.parse({
        ...base,
        verified_persons: [
          ...base.verified_persons,
          { name: 'Unnamed Survivor', confidence: 'indicated', possible_victim: false },
        ],
      });

      const summary = writeRecords(db, writeInput({ verification }), config);

      expect(summary.victimFlags).toBe(2);
      expect(summary.personsWritten).toBe(2);
      expect(db.getPersonByKey('unnamed survivor')).toBeNull();
    });

    it('diverts a name flagged only by extraction even when verification clears it', () => {
      const base = manifestVerification();
      const verification = {
        ...base,
        verified_persons: base.verified_persons.map((p) => ({ ...p, possible_victim: false })),
      };

      writeRecords(db, writeInput({ verification }), config);

      expect(db.getPersonByKey('jane doe')).toBeNull();
      expect(db.listConflicts({ kind: 'victim_diversion' })).toHaveLength(1);
    });

    it('diverts names whose flag arrives as a string or inside an object', () => {
      const baseExtraction = manifestExtraction();
      const extraction = ExtractionResultSchema.parse({
        ...baseExtraction,
        persons_found: [...baseExtraction.persons_found, { name: 'Maria Lopez', possible_victim: 'true' }],
        victim_flags: [...baseExtraction.victim_flags, { name: 'Carla Ruiz' }],
      });
      const baseVerification = manifestVerification();
      const verification = VerificationResultSchema.parse({
        ...baseVerification,
        verified_persons: [
          ...baseVerification.verified_persons,
          { name: 'Maria Lopez', confidence: 'indicated', possible_victim: 'yes' },
          { name: 'Carla Ruiz', confidence: 'indicated', possible_victim: 'no' },
        ],
      });
      const baseDecision = manifestDecision();
      const decision = DecisionResultSchema.parse({
        ...baseDecision,
        relationship_determinations: [
          ...baseDecision.relationship_determinations,
          { person_a: 'John Smith', person_b: 'Maria Lopez', relationship_type: 'co_traveler', evidence_strength: 'weak' },
          { person_a: 'Carla Ruiz', person_b: 'Robert Hale', relationship_type: 'co_traveler', evidence_strength: 'weak' },
        ],
      });

      const summary = writeRecords(db, writeInput({ extraction, verification, decision }), config);

      expect(db.getPersonByKey('maria lopez')).toBeNull();
      expect(db.getPersonByKey('carla ruiz')).toBeNull();
      expect(summary).toMatchObject({
        personsWritten: 2,
        victimFlags: 3,
        relationshipsWritten: 1,
        relationshipsSkipped: 4,
      });
      expect(
        db
          .listConflicts({ kind: 'victim_diversion' })
          .map((c) => c.document_a_claim)
          .sort()
      ).toEqual(['Possible victim: Carla Ruiz', 'Possible victim: Jane Doe', 'Possible victim: Maria Lopez']);
      expect(db.getStats().total_relationships).toBe(1);
    });

    it('diverts configured terms', () => {
      writeRecords(db, writeInput(), createTestConfig({ protectedTerms: ['robert hale'] }));
      expect(db.getPersonByKey('robert hale')).toBeNull();
      expect(db.getStats().victim_diversions).toBe(2);
    });
  });

  describe('edge cases', () => {
    it('marks the document partially redacted when any person is redacted', () => {
      const base = manifestExtraction();
      const extraction = {
        ...base,
        persons_found: base.persons_found.map((p, i) => (i === 0 ? { ...p, is_redacted: true } : p)),
      };

      const { documentId } = writeRecords(db, writeInput({ extraction }), config);
      expect(db.getDocument(documentId)?.redaction_status).toBe('partial');
    });

    it('flags the document for review when any stage asks', () => {
      const decision = { ...manifestDecision(), requires_human_review: true };
      const { documentId } = writeRecords(db, writeInput({ decision }), config);
      expect(db.getDocument(documentId)?.requires_human_review).toBe(true);
    });

    it('rolls the whole document back when a write fails', () => {
      vi.spyOn(db, 'insertProcessingLog').mockImplementation(() => {
        throw new Error('disk full');
      });

      expect(() => writeRecords(db, writeInput(), config)).toThrow('disk full');
      expect(db.getStats()).toMatchObject({
        total_documents: 0,
        total_persons: 0,
        total_locations: 0,
        total_events: 0,
        total_relationships: 0,
        total_conflicts: 0,
      });
    });
  });
});

describe('eventTitle', () => {
  it('uses the description when present', () => {
    expect(eventTitle({ description: 'Dinner', event_type: 'meeting', date: null })).toBe('Dinner');
  });

  it('falls back to type and date', () => {
    expect(eventTitle({ description: '', event_type: 'meeting', date: '2001-05-01' })).toBe(
      'meeting — 2001-05-01'
    );
    expect(eventTitle({ description: '', event_type: 'meeting', date: null })).toBe('meeting — undated');
  });
});
