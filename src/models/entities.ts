/**
 * Persisted entity rows: persons, locations, events, relationships and the
 * append-only audit tables.
 */

import type { ConfidenceLevel } from './confidence.js';
import type { DatePrecision, RedactionStatus } from './document.js';
import type { EventType, LocationType } from './extraction.js';
import type { EvidenceStrength, PersonCategory, RelationshipType } from './decision.js';

/**
 * Person row. Identity is `name_key`; `id` exists only for joins.
 * `victim_protected` and `is_victim` are constrained to false by the schema:
 * a possible victim never gets a row at all.
 */
export interface PersonRecord {
  id: string;
  name_key: string;
  full_name: string;
  confidence: ConfidenceLevel;
  redaction_status: RedactionStatus;
  name_recovered: boolean;
  power_public_profile: number | null;
  power_institutional: number | null;
  power_network_centrality: number | null;
  power_corroboration: number;
  category: PersonCategory | null;
  upgrade_gap_note: string | null;
  flagged_for_review: boolean;
  victim_protected: false;
  is_victim: false;
  created_at: string;
  updated_at: string;
}

export interface PersonUpsert {
  name_key: string;
  full_name: string;
  confidence: ConfidenceLevel;
  redaction_status: RedactionStatus;
  name_recovered: boolean;
  power_public_profile: number | null;
  power_institutional: number | null;
  power_network_centrality: number | null;
  category: PersonCategory | null;
  upgrade_gap_note: string | null;
  flagged_for_review: boolean;
}

/** Person plus the aggregates the context assembler renders */
export interface PersonSummary {
  id: string;
  name_key: string;
  full_name: string;
  confidence: ConfidenceLevel;
  category: PersonCategory | null;
  document_count: number;
}

export interface LocationRecord {
  id: string;
  name_key: string;
  name: string;
  location_type: LocationType;
  confidence: ConfidenceLevel;
  created_at: string;
  updated_at: string;
}

export type LocationUpsert = Pick<LocationRecord, 'name_key' | 'name' | 'location_type' | 'confidence'>;

export interface LocationSummary {
  id: string;
  name_key: string;
  name: string;
  location_type: LocationType;
  event_count: number;
}

/** Events are observations: never deduplicated */
export interface EventRecord {
  id: string;
  event_type: EventType;
  title: string;
  event_date: string | null;
  date_precision: DatePrecision;
  confidence: ConfidenceLevel;
  primary_location_id: string | null;
  upgrade_gap_note: string | null;
  notes: string | null;
  created_at: string;
}

export type EventInsert = Omit<EventRecord, 'id' | 'created_at'>;

/**
 * Relationship row for an unordered person pair, stored with
 * person_a_id < person_b_id.
 */
export interface RelationshipRecord {
  id: string;
  person_a_id: string;
  person_b_id: string;
  relationship_type: RelationshipType;
  evidence_strength: EvidenceStrength;
  co_occurrence_count: number;
  source_document_ids: string[];
  notes: string | null;
  created_at: string;
  updated_at: string;
}

export interface RelationshipObservation {
  person_a_id: string;
  person_b_id: string;
  relationship_type: RelationshipType;
  evidence_strength: EvidenceStrength;
  document_id: string;
  notes: string | null;
}

export const CONFLICT_KINDS = ['victim_diversion', 'claim_conflict'] as const;

export type ConflictKind = (typeof CONFLICT_KINDS)[number];

/** Append-only */
export interface ConflictRecord {
  id: string;
  kind: ConflictKind;
  entity_type: string;
  conflict_field: string;
  document_a_id: string;
  document_a_claim: string;
  document_b_claim: string;
  requires_human_review: boolean;
  created_at: string;
}

export type ConflictInsert = Omit<ConflictRecord, 'id' | 'created_at'>;

export const PROCESSING_STATUSES = ['complete', 'failed'] as const;

export type ProcessingStatus = (typeof PROCESSING_STATUSES)[number];

/** Append-only, one per document run */
export interface ProcessingLogEntry {
  id: string;
  document_id: string;
  batch_id: string;
  agent_name: string;
  status: ProcessingStatus;
  persons_extracted: number;
  locations_extracted: number;
  events_created: number;
  relationships_written: number;
  conflicts_flagged: number;
  victim_flags: number;
  model_used: string;
  tokens_used: number;
  processing_ms: number;
  started_at: string;
  completed_at: string;
}

export type ProcessingLogInsert = Omit<ProcessingLogEntry, 'id'>;
