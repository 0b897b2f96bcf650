/**
 * Type definitions for DatabaseService: error codes, raw row shapes and the
 * statistics view.
 */

/**
 * Error codes for database operations
 */
export enum DatabaseErrorCode {
  DATABASE_NOT_FOUND = 'DATABASE_NOT_FOUND',
  DATABASE_ALREADY_EXISTS = 'DATABASE_ALREADY_EXISTS',
  DATABASE_LOCKED = 'DATABASE_LOCKED',
  DOCUMENT_REFERENCE_COLLISION = 'DOCUMENT_REFERENCE_COLLISION',
  INVALID_RELATIONSHIP = 'INVALID_RELATIONSHIP',
  FOREIGN_KEY_VIOLATION = 'FOREIGN_KEY_VIOLATION',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  INVALID_NAME = 'INVALID_NAME',
}

/**
 * Custom error class for database operations
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

export interface DatabaseStats {
  name: string;
  path: string;
  total_documents: number;
  processed_documents: number;
  documents_requiring_review: number;
  total_persons: number;
  persons_by_confidence: {
    unverified: number;
    indicated: number;
    corroborated: number;
    confirmed: number;
  };
  total_locations: number;
  total_events: number;
  total_relationships: number;
  total_conflicts: number;
  victim_diversions: number;
  total_processing_runs: number;
  total_tokens_used: number;
  storage_size_bytes: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RAW ROWS (SQLite integers for booleans, JSON text for arrays)
// ═══════════════════════════════════════════════════════════════════════════════

export interface DocumentRow {
  id: string;
  doc_reference_id: string;
  source_url: string;
  source: string;
  document_type: string;
  document_date: string | null;
  date_precision: string;
  ocr_quality: string;
  has_encoding_artifacts: number;
  page_count: number;
  file_size_kb: number;
  content_type: string;
  redaction_status: string;
  batch_id: string;
  is_processed: number;
  processed_at: string | null;
  notes: string | null;
  requires_human_review: number;
  created_at: string;
  updated_at: string;
}

export interface PersonRow {
  id: string;
  name_key: string;
  full_name: string;
  confidence: string;
  confidence_rank: number;
  redaction_status: string;
  name_recovered: number;
  power_public_profile: number | null;
  power_institutional: number | null;
  power_network_centrality: number | null;
  power_corroboration: number;
  category: string | null;
  upgrade_gap_note: string | null;
  flagged_for_review: number;
  victim_protected: number;
  is_victim: number;
  created_at: string;
  updated_at: string;
}

export interface PersonSummaryRow {
  id: string;
  name_key: string;
  full_name: string;
  confidence: string;
  category: string | null;
  document_count: number;
}

export interface LocationRow {
  id: string;
  name_key: string;
  name: string;
  location_type: string;
  confidence: string;
  confidence_rank: number;
  created_at: string;
  updated_at: string;
}

export interface LocationSummaryRow {
  id: string;
  name_key: string;
  name: string;
  location_type: string;
  event_count: number;
}

export interface EventRow {
  id: string;
  event_type: string;
  title: string;
  event_date: string | null;
  date_precision: string;
  confidence: string;
  primary_location_id: string | null;
  upgrade_gap_note: string | null;
  notes: string | null;
  created_at: string;
}

export interface RelationshipRow {
  id: string;
  person_a_id: string;
  person_b_id: string;
  relationship_type: string;
  evidence_strength: string;
  co_occurrence_count: number;
  source_document_ids: string;
  notes: string | null;
  created_at: string;
  updated_at: string;
}

export interface ConflictRow {
  id: string;
  kind: string;
  entity_type: string;
  conflict_field: string;
  document_a_id: string;
  document_a_claim: string;
  document_b_claim: string;
  requires_human_review: number;
  created_at: string;
}

export interface ProcessingLogRow {
  id: string;
  document_id: string;
  batch_id: string;
  agent_name: string;
  status: string;
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
