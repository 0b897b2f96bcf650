/**
 * Row conversion functions for DatabaseService
 *
 * Converts SQLite rows to domain records. Enum columns are validated at
 * runtime so a hand-edited or foreign database fails loudly instead of
 * leaking unknown values into the pipeline.
 */

import {
  CONFIDENCE_LEVELS,
  CONFLICT_KINDS,
  DATE_PRECISIONS,
  DOCUMENT_TYPES,
  EVENT_TYPES,
  EVIDENCE_STRENGTHS,
  LOCATION_TYPES,
  OCR_QUALITIES,
  PERSON_CATEGORIES,
  PROCESSING_STATUSES,
  REDACTION_STATUSES,
  RELATIONSHIP_TYPES,
  type ConflictRecord,
  type DocumentRecord,
  type EventRecord,
  type LocationRecord,
  type LocationSummary,
  type PersonRecord,
  type PersonSummary,
  type ProcessingLogEntry,
  type RelationshipRecord,
} from '../../../models/index.js';
import {
  DatabaseError,
  DatabaseErrorCode,
  type ConflictRow,
  type DocumentRow,
  type EventRow,
  type LocationRow,
  type LocationSummaryRow,
  type PersonRow,
  type PersonSummaryRow,
  type ProcessingLogRow,
  type RelationshipRow,
} from './types.js';

/**
 * Validate that a string value is a member of an enum/union type at runtime.
 */
function validateEnum<T extends string>(
  value: string,
  validValues: readonly T[],
  fieldName: string,
  id: string
): T {
  const match = validValues.find((v) => v === value);
  if (match === undefined) {
    throw new DatabaseError(
      `Invalid ${fieldName} "${value}" in record ${id}. Valid values: ${validValues.join(', ')}`,
      DatabaseErrorCode.SCHEMA_MISMATCH
    );
  }
  return match;
}

function optionalEnum<T extends string>(
  value: string | null,
  validValues: readonly T[],
  fieldName: string,
  id: string
): T | null {
  return value === null ? null : validateEnum(value, validValues, fieldName, id);
}

/**
 * Parse the JSON id list on a relationship row. Corrupt data yields [] and a
 * log line; the count column remains authoritative.
 */
function parseIdList(id: string, raw: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : [];
  } catch (error) {
    console.error(
      `[converters] Corrupt source_document_ids on relationship ${id}: ${error instanceof Error ? error.message : String(error)}`
    );
    return [];
  }
}

export function rowToDocument(row: DocumentRow): DocumentRecord {
  return {
    id: row.id,
    doc_reference_id: row.doc_reference_id,
    source_url: row.source_url,
    source: row.source,
    document_type: validateEnum(row.document_type, DOCUMENT_TYPES, 'document_type', row.id),
    document_date: row.document_date,
    date_precision: validateEnum(row.date_precision, DATE_PRECISIONS, 'date_precision', row.id),
    ocr_quality: validateEnum(row.ocr_quality, OCR_QUALITIES, 'ocr_quality', row.id),
    has_encoding_artifacts: row.has_encoding_artifacts === 1,
    page_count: row.page_count,
    file_size_kb: row.file_size_kb,
    content_type: row.content_type,
    redaction_status: validateEnum(row.redaction_status, REDACTION_STATUSES, 'redaction_status', row.id),
    batch_id: row.batch_id,
    is_processed: row.is_processed === 1,
    processed_at: row.processed_at,
    notes: row.notes,
    requires_human_review: row.requires_human_review === 1,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

export function rowToPerson(row: PersonRow): PersonRecord {
  if (row.victim_protected !== 0 || row.is_victim !== 0) {
    // CHECK constraints make this unreachable on a database this code created
    throw new DatabaseError(
      `Person ${row.id} carries a victim flag; such rows must never exist`,
      DatabaseErrorCode.SCHEMA_MISMATCH
    );
  }
  return {
    id: row.id,
    name_key: row.name_key,
    full_name: row.full_name,
    confidence: validateEnum(row.confidence, CONFIDENCE_LEVELS, 'confidence', row.id),
    redaction_status: validateEnum(row.redaction_status, REDACTION_STATUSES, 'redaction_status', row.id),
    name_recovered: row.name_recovered === 1,
    power_public_profile: row.power_public_profile,
    power_institutional: row.power_institutional,
    power_network_centrality: row.power_network_centrality,
    power_corroboration: row.power_corroboration,
    category: optionalEnum(row.category, PERSON_CATEGORIES, 'category', row.id),
    upgrade_gap_note: row.upgrade_gap_note,
    flagged_for_review: row.flagged_for_review === 1,
    victim_protected: false,
    is_victim: false,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

export function rowToPersonSummary(row: PersonSummaryRow): PersonSummary {
  return {
    id: row.id,
    name_key: row.name_key,
    full_name: row.full_name,
    confidence: validateEnum(row.confidence, CONFIDENCE_LEVELS, 'confidence', row.id),
    category: optionalEnum(row.category, PERSON_CATEGORIES, 'category', row.id),
    document_count: row.document_count,
  };
}

export function rowToLocation(row: LocationRow): LocationRecord {
  return {
    id: row.id,
    name_key: row.name_key,
    name: row.name,
    location_type: validateEnum(row.location_type, LOCATION_TYPES, 'location_type', row.id),
    confidence: validateEnum(row.confidence, CONFIDENCE_LEVELS, 'confidence', row.id),
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

export function rowToLocationSummary(row: LocationSummaryRow): LocationSummary {
  return {
    id: row.id,
    name_key: row.name_key,
    name: row.name,
    location_type: validateEnum(row.location_type, LOCATION_TYPES, 'location_type', row.id),
    event_count: row.event_count,
  };
}

export function rowToEvent(row: EventRow): EventRecord {
  return {
    id: row.id,
    event_type: validateEnum(row.event_type, EVENT_TYPES, 'event_type', row.id),
    title: row.title,
    event_date: row.event_date,
    date_precision: validateEnum(row.date_precision, DATE_PRECISIONS, 'date_precision', row.id),
    confidence: validateEnum(row.confidence, CONFIDENCE_LEVELS, 'confidence', row.id),
    primary_location_id: row.primary_location_id,
    upgrade_gap_note: row.upgrade_gap_note,
    notes: row.notes,
    created_at: row.created_at,
  };
}

export function rowToRelationship(row: RelationshipRow): RelationshipRecord {
  return {
    id: row.id,
    person_a_id: row.person_a_id,
    person_b_id: row.person_b_id,
    relationship_type: validateEnum(row.relationship_type, RELATIONSHIP_TYPES, 'relationship_type', row.id),
    evidence_strength: validateEnum(row.evidence_strength, EVIDENCE_STRENGTHS, 'evidence_strength', row.id),
    co_occurrence_count: row.co_occurrence_count,
    source_document_ids: parseIdList(row.id, row.source_document_ids),
    notes: row.notes,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

export function rowToConflict(row: ConflictRow): ConflictRecord {
  return {
    id: row.id,
    kind: validateEnum(row.kind, CONFLICT_KINDS, 'kind', row.id),
    entity_type: row.entity_type,
    conflict_field: row.conflict_field,
    document_a_id: row.document_a_id,
    document_a_claim: row.document_a_claim,
    document_b_claim: row.document_b_claim,
    requires_human_review: row.requires_human_review === 1,
    created_at: row.created_at,
  };
}

export function rowToProcessingLog(row: ProcessingLogRow): ProcessingLogEntry {
  return {
    ...row,
    status: validateEnum(row.status, PROCESSING_STATUSES, 'status', row.id),
  };
}
