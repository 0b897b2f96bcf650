/**
 * Record Writer
 *
 * Persists one document's stage outputs in seven ordered steps, all inside
 * a single store transaction:
 *
 *   1. document upsert (by derived reference)
 *   2. persons: victim diversion or upsert + person-document link
 *   3. locations (by name key)
 *   4. events (append-only) + event-document and event-person links
 *   5. relationships (by unordered person pair)
 *   6. claim conflicts (append-only)
 *   7. processing log entry
 *
 * A diverted name never reaches persons, person_documents, event_persons or
 * person_relationships. It leaves exactly one victim_diversion conflict
 * record for the document, and nothing else.
 *
 * @module services/pipeline/writer
 */

import {
  type DecisionResult,
  type DocumentRecord,
  type ExtractionResult,
  type NormalizedDocument,
  type PersonIntelligence,
  type VerificationResult,
  type VerifiedPerson,
} from '../../models/index.js';
import { DatabaseError, DatabaseErrorCode } from '../storage/index.js';
import type { RecordStore } from '../storage/types.js';
import { deriveDocumentReference } from '../../utils/hash.js';
import { isUsableNameKey, normalizeDisplayName, toNameKey } from '../../utils/names.js';
import type { PipelineConfig } from './config.js';
import { collectFlaggedVictimKeys, diversionReason } from './victim-protection.js';

export const VICTIM_DIVERSION_CLAIM = 'Requires human review before any database write';
export const PROCESSING_AGENT_NAME = 'full_pipeline';

export interface StageModels {
  extraction: string;
  verification: string;
  decision: string;
}

export interface WriteInput {
  document: NormalizedDocument;
  batchId: string;
  extraction: ExtractionResult;
  verification: VerificationResult;
  decision: DecisionResult;
  models: StageModels;
  /** Sum over the three stages */
  tokensUsed: number;
  processingMs: number;
  /** ISO 8601, when the document run began */
  startedAt: string;
}

export interface WriteSummary {
  documentId: string;
  documentReference: string;
  personsWritten: number;
  locationsWritten: number;
  eventsCreated: number;
  eventPersonLinks: number;
  relationshipsWritten: number;
  relationshipsSkipped: number;
  conflictsLogged: number;
  victimFlags: number;
  tokensUsed: number;
}

type WriterConfig = Pick<PipelineConfig, 'protectedTerms' | 'documentSource'>;

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

export function eventTitle(event: { description: string; event_type: string; date: string | null }): string {
  return event.description || `${event.event_type} — ${event.date ?? 'undated'}`;
}

function hasRedactedPerson(extraction: ExtractionResult, verification: VerificationResult): boolean {
  return (
    extraction.persons_found.some((p) => p.is_redacted) ||
    verification.verified_persons.some((p) => p.is_redacted)
  );
}

/**
 * Person-name resolution for the current write. Diverted and protected
 * names never resolve, even if a row for the same key exists from an
 * earlier document.
 */
class PersonResolver {
  private readonly written = new Map<string, string>();
  private readonly diverted = new Set<string>();

  constructor(
    private readonly store: RecordStore,
    private readonly flaggedKeys: ReadonlySet<string>,
    private readonly protectedTerms: readonly string[]
  ) {}

  markWritten(nameKey: string, personId: string): void {
    this.written.set(nameKey, personId);
  }

  markDiverted(nameKey: string): void {
    this.diverted.add(nameKey);
  }

  isDiverted(nameKey: string): boolean {
    return this.diverted.has(nameKey);
  }

  resolve(name: string): string | null {
    const key = toNameKey(name);
    if (!isUsableNameKey(key) || this.diverted.has(key)) return null;
    if (diversionReason({ name: key, possible_victim: false }, this.flaggedKeys, this.protectedTerms)) {
      return null;
    }
    return this.written.get(key) ?? this.store.getPersonByKey(key)?.id ?? null;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// WRITER
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Write all stage outputs for one document. A store error rolls the whole
 * document back and propagates.
 */
export function writeRecords(store: RecordStore, input: WriteInput, config: WriterConfig): WriteSummary {
  const { document, extraction, verification, decision } = input;
  const documentReference = deriveDocumentReference(document.url);

  const summary = store.transaction((): WriteSummary => {
    const counts = {
      personsWritten: 0,
      locationsWritten: 0,
      eventsCreated: 0,
      eventPersonLinks: 0,
      relationshipsWritten: 0,
      relationshipsSkipped: 0,
      conflictsLogged: 0,
      victimFlags: 0,
    };

    // ── 1. Document ────────────────────────────────────────────────────────
    const record: DocumentRecord = store.upsertDocument({
      doc_reference_id: documentReference,
      source_url: document.url.trim(),
      source: config.documentSource,
      document_type: extraction.document_type,
      document_date: extraction.document_date,
      date_precision: extraction.date_precision,
      ocr_quality: document.ocr_quality,
      has_encoding_artifacts: document.has_encoding_artifacts,
      page_count: document.page_count,
      file_size_kb: document.file_size_kb,
      content_type: document.content_type,
      redaction_status: hasRedactedPerson(extraction, verification) ? 'partial' : 'none',
      batch_id: input.batchId,
      is_processed: true,
      processed_at: new Date().toISOString(),
      notes: verification.verification_summary || null,
      requires_human_review:
        extraction.requires_human_review ||
        verification.requires_human_review ||
        decision.requires_human_review,
    });
    const documentId = record.id;

    // ── 2. Persons ─────────────────────────────────────────────────────────
    const flaggedKeys = collectFlaggedVictimKeys(extraction);
    const resolver = new PersonResolver(store, flaggedKeys, config.protectedTerms);
    const intelligence = new Map<string, PersonIntelligence>(
      decision.persons_intelligence.map((p) => [toNameKey(p.name), p])
    );

    const divert = (name: string): void => {
      const key = toNameKey(name);
      if (resolver.isDiverted(key)) return;
      resolver.markDiverted(key);
      store.insertConflict({
        kind: 'victim_diversion',
        entity_type: 'person',
        conflict_field: 'victim_flag',
        document_a_id: documentId,
        document_a_claim: `Possible victim: ${normalizeDisplayName(name)}`,
        document_b_claim: VICTIM_DIVERSION_CLAIM,
        requires_human_review: true,
      });
      counts.victimFlags++;
    };

    const writePerson = (person: VerifiedPerson): void => {
      const key = toNameKey(person.name);
      const intel = intelligence.get(key);
      const power = intel?.power_index ?? null;
      const written = store.upsertPerson({
        name_key: key,
        full_name: normalizeDisplayName(person.name),
        confidence: person.confidence,
        redaction_status: person.is_redacted ? 'partial' : 'none',
        name_recovered: person.name_recovered,
        power_public_profile: power?.public_profile ?? null,
        power_institutional: power?.institutional ?? null,
        power_network_centrality: power?.network_centrality ?? null,
        category: intel?.category ?? null,
        upgrade_gap_note: person.upgrade_gap ?? intel?.upgrade_gap ?? null,
        flagged_for_review: (intel?.pattern_flags.length ?? 0) > 0,
      });
      store.linkPersonDocument(written.id, documentId, person.confidence);
      resolver.markWritten(key, written.id);
      counts.personsWritten++;
    };

    // Divert first so a name flagged anywhere in the document is never written
    for (const person of [...verification.verified_persons, ...extraction.persons_found]) {
      if (!isUsableNameKey(toNameKey(person.name))) continue;
      if (diversionReason(person, flaggedKeys, config.protectedTerms)) {
        divert(person.name);
      }
    }

    for (const person of verification.verified_persons) {
      const key = toNameKey(person.name);
      if (!isUsableNameKey(key) || resolver.isDiverted(key)) continue;
      writePerson(person);
    }

    // ── 3. Locations ───────────────────────────────────────────────────────
    const locationIds = new Map<string, string>();
    for (const location of verification.verified_locations) {
      const key = toNameKey(location.name);
      if (!isUsableNameKey(key)) continue;
      const written = store.upsertLocation({
        name_key: key,
        name: normalizeDisplayName(location.name),
        location_type: location.location_type,
        confidence: location.confidence,
      });
      locationIds.set(key, written.id);
      counts.locationsWritten++;
    }

    // ── 4. Events ──────────────────────────────────────────────────────────
    for (const event of verification.verified_events) {
      const eventId = store.insertEvent({
        event_type: event.event_type,
        title: eventTitle(event),
        event_date: event.date,
        date_precision: event.date_precision,
        confidence: event.confidence,
        primary_location_id: event.location ? (locationIds.get(toNameKey(event.location)) ?? null) : null,
        upgrade_gap_note: event.upgrade_gap,
        notes: event.verification_notes || null,
      });
      store.linkEventDocument(eventId, documentId, 'primary_proof');
      counts.eventsCreated++;

      const linked = new Set<string>();
      for (const name of event.persons_present) {
        const personId = resolver.resolve(name);
        if (!personId || linked.has(personId)) continue;
        store.linkEventPerson(eventId, personId, event.confidence);
        linked.add(personId);
        counts.eventPersonLinks++;
      }
    }

    // ── 5. Relationships ───────────────────────────────────────────────────
    for (const determination of decision.relationship_determinations) {
      const personA = resolver.resolve(determination.person_a);
      const personB = resolver.resolve(determination.person_b);
      if (!personA || !personB) {
        counts.relationshipsSkipped++;
        continue;
      }
      try {
        store.upsertRelationship({
          person_a_id: personA,
          person_b_id: personB,
          relationship_type: determination.relationship_type,
          evidence_strength: determination.evidence_strength,
          document_id: documentId,
          notes: determination.notes,
        });
        counts.relationshipsWritten++;
      } catch (error) {
        if (error instanceof DatabaseError && error.code === DatabaseErrorCode.INVALID_RELATIONSHIP) {
          counts.relationshipsSkipped++;
          continue;
        }
        throw error;
      }
    }

    // ── 6. Claim conflicts ─────────────────────────────────────────────────
    for (const conflict of verification.conflicts_detected) {
      store.insertConflict({
        kind: 'claim_conflict',
        entity_type: conflict.conflict_type,
        conflict_field: conflict.field ?? conflict.description,
        document_a_id: documentId,
        document_a_claim: conflict.document_claim,
        document_b_claim: conflict.conflicting_claim,
        requires_human_review: true,
      });
      counts.conflictsLogged++;
    }

    // ── 7. Processing log ──────────────────────────────────────────────────
    store.insertProcessingLog({
      document_id: documentId,
      batch_id: input.batchId,
      agent_name: PROCESSING_AGENT_NAME,
      status: 'complete',
      persons_extracted: counts.personsWritten,
      locations_extracted: counts.locationsWritten,
      events_created: counts.eventsCreated,
      relationships_written: counts.relationshipsWritten,
      conflicts_flagged: counts.conflictsLogged,
      victim_flags: counts.victimFlags,
      model_used: [input.models.extraction, input.models.verification, input.models.decision].join(','),
      tokens_used: input.tokensUsed,
      processing_ms: input.processingMs,
      started_at: input.startedAt,
      completed_at: new Date().toISOString(),
    });

    return { documentId, documentReference, ...counts, tokensUsed: input.tokensUsed };
  });

  console.error(
    `[Writer] ${documentReference}: ${summary.personsWritten} persons, ${summary.locationsWritten} locations, ` +
      `${summary.eventsCreated} events, ${summary.relationshipsWritten} relationships ` +
      `(${summary.relationshipsSkipped} skipped), ${summary.conflictsLogged} conflicts, ` +
      `${summary.victimFlags} victim flags`
  );

  return summary;
}
