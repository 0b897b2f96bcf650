/**
 * SQL Schema Definitions
 *
 * Natural keys carry the UNIQUE constraints that make the record writer's
 * upserts idempotent. Surrogate ids (uuid v4) exist only for joins.
 *
 * @module migrations/schema-definitions
 */

/** Current schema version */
export const SCHEMA_VERSION = 1;

export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA cache_size = -64000',
  'PRAGMA busy_timeout = 30000',
] as const;

export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

const CONFIDENCE_CHECK = `CHECK (confidence IN ('unverified', 'indicated', 'corroborated', 'confirmed'))`;

export const CREATE_DOCUMENTS_TABLE = `
CREATE TABLE IF NOT EXISTS documents (
  id TEXT PRIMARY KEY,
  doc_reference_id TEXT NOT NULL UNIQUE,
  source_url TEXT NOT NULL,
  source TEXT NOT NULL,
  document_type TEXT NOT NULL CHECK (document_type IN ('flight_manifest', 'email', 'financial_record', 'fbi_report', 'court_filing', 'photograph', 'contact_book_entry', 'other')),
  document_date TEXT,
  date_precision TEXT NOT NULL CHECK (date_precision IN ('exact', 'approximate', 'range', 'year_only', 'unknown')),
  ocr_quality TEXT NOT NULL CHECK (ocr_quality IN ('clean', 'minor_artifacts', 'degraded', 'poor')),
  has_encoding_artifacts INTEGER NOT NULL DEFAULT 0,
  page_count INTEGER NOT NULL DEFAULT 0,
  file_size_kb INTEGER NOT NULL DEFAULT 0,
  content_type TEXT NOT NULL,
  redaction_status TEXT NOT NULL DEFAULT 'none' CHECK (redaction_status IN ('none', 'partial')),
  batch_id TEXT NOT NULL,
  is_processed INTEGER NOT NULL DEFAULT 0,
  processed_at TEXT,
  notes TEXT,
  requires_human_review INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * Persons: victim_protected / is_victim can never be set. A possible victim
 * is diverted to conflict_records and never reaches this table.
 */
export const CREATE_PERSONS_TABLE = `
CREATE TABLE IF NOT EXISTS persons (
  id TEXT PRIMARY KEY,
  name_key TEXT NOT NULL UNIQUE,
  full_name TEXT NOT NULL,
  confidence TEXT NOT NULL ${CONFIDENCE_CHECK},
  confidence_rank INTEGER NOT NULL CHECK (confidence_rank BETWEEN 0 AND 3),
  redaction_status TEXT NOT NULL DEFAULT 'none' CHECK (redaction_status IN ('none', 'partial')),
  name_recovered INTEGER NOT NULL DEFAULT 0,
  power_public_profile INTEGER CHECK (power_public_profile BETWEEN 0 AND 100),
  power_institutional INTEGER CHECK (power_institutional BETWEEN 0 AND 100),
  power_network_centrality INTEGER CHECK (power_network_centrality BETWEEN 0 AND 100),
  power_corroboration INTEGER NOT NULL CHECK (power_corroboration IN (15, 40, 70, 90)),
  category TEXT,
  upgrade_gap_note TEXT,
  flagged_for_review INTEGER NOT NULL DEFAULT 0,
  victim_protected INTEGER NOT NULL DEFAULT 0 CHECK (victim_protected = 0),
  is_victim INTEGER NOT NULL DEFAULT 0 CHECK (is_victim = 0),
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

export const CREATE_LOCATIONS_TABLE = `
CREATE TABLE IF NOT EXISTS locations (
  id TEXT PRIMARY KEY,
  name_key TEXT NOT NULL UNIQUE,
  name TEXT NOT NULL,
  location_type TEXT NOT NULL CHECK (location_type IN ('private_residence', 'island', 'private_aircraft', 'hotel', 'city', 'country', 'other')),
  confidence TEXT NOT NULL ${CONFIDENCE_CHECK},
  confidence_rank INTEGER NOT NULL CHECK (confidence_rank BETWEEN 0 AND 3),
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

export const CREATE_EVENTS_TABLE = `
CREATE TABLE IF NOT EXISTS events (
  id TEXT PRIMARY KEY,
  event_type TEXT NOT NULL CHECK (event_type IN ('flight', 'property_visit', 'meeting', 'communication', 'financial_transaction', 'other')),
  title TEXT NOT NULL,
  event_date TEXT,
  date_precision TEXT NOT NULL CHECK (date_precision IN ('exact', 'approximate', 'range', 'year_only', 'unknown')),
  confidence TEXT NOT NULL ${CONFIDENCE_CHECK},
  primary_location_id TEXT REFERENCES locations(id),
  upgrade_gap_note TEXT,
  notes TEXT,
  created_at TEXT NOT NULL
)
`;

export const CREATE_PERSON_DOCUMENTS_TABLE = `
CREATE TABLE IF NOT EXISTS person_documents (
  id TEXT PRIMARY KEY,
  person_id TEXT NOT NULL REFERENCES persons(id),
  document_id TEXT NOT NULL REFERENCES documents(id),
  confidence TEXT NOT NULL ${CONFIDENCE_CHECK},
  created_at TEXT NOT NULL,
  UNIQUE (person_id, document_id)
)
`;

export const CREATE_EVENT_DOCUMENTS_TABLE = `
CREATE TABLE IF NOT EXISTS event_documents (
  id TEXT PRIMARY KEY,
  event_id TEXT NOT NULL REFERENCES events(id),
  document_id TEXT NOT NULL REFERENCES documents(id),
  support_type TEXT NOT NULL DEFAULT 'primary_proof',
  created_at TEXT NOT NULL,
  UNIQUE (event_id, document_id)
)
`;

export const CREATE_EVENT_PERSONS_TABLE = `
CREATE TABLE IF NOT EXISTS event_persons (
  id TEXT PRIMARY KEY,
  event_id TEXT NOT NULL REFERENCES events(id),
  person_id TEXT NOT NULL REFERENCES persons(id),
  confidence TEXT NOT NULL ${CONFIDENCE_CHECK},
  created_at TEXT NOT NULL,
  UNIQUE (event_id, person_id)
)
`;

/**
 * Unordered person pair stored as (lower id, higher id). The CHECK rejects
 * both reversed pairs and self-relationships.
 */
export const CREATE_PERSON_RELATIONSHIPS_TABLE = `
CREATE TABLE IF NOT EXISTS person_relationships (
  id TEXT PRIMARY KEY,
  person_a_id TEXT NOT NULL REFERENCES persons(id),
  person_b_id TEXT NOT NULL REFERENCES persons(id),
  relationship_type TEXT NOT NULL CHECK (relationship_type IN ('co_traveler', 'financial', 'social', 'professional', 'unknown')),
  evidence_strength TEXT NOT NULL CHECK (evidence_strength IN ('weak', 'moderate', 'strong')),
  co_occurrence_count INTEGER NOT NULL DEFAULT 1,
  source_document_ids TEXT NOT NULL DEFAULT '[]',
  notes TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  CHECK (person_a_id < person_b_id),
  UNIQUE (person_a_id, person_b_id)
)
`;

export const CREATE_CONFLICT_RECORDS_TABLE = `
CREATE TABLE IF NOT EXISTS conflict_records (
  id TEXT PRIMARY KEY,
  kind TEXT NOT NULL CHECK (kind IN ('victim_diversion', 'claim_conflict')),
  entity_type TEXT NOT NULL,
  conflict_field TEXT NOT NULL,
  document_a_id TEXT NOT NULL REFERENCES documents(id),
  document_a_claim TEXT NOT NULL,
  document_b_claim TEXT NOT NULL,
  requires_human_review INTEGER NOT NULL DEFAULT 1,
  created_at TEXT NOT NULL
)
`;

export const CREATE_PROCESSING_LOG_TABLE = `
CREATE TABLE IF NOT EXISTS processing_log (
  id TEXT PRIMARY KEY,
  document_id TEXT NOT NULL REFERENCES documents(id),
  batch_id TEXT NOT NULL,
  agent_name TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('complete', 'failed')),
  persons_extracted INTEGER NOT NULL DEFAULT 0,
  locations_extracted INTEGER NOT NULL DEFAULT 0,
  events_created INTEGER NOT NULL DEFAULT 0,
  relationships_written INTEGER NOT NULL DEFAULT 0,
  conflicts_flagged INTEGER NOT NULL DEFAULT 0,
  victim_flags INTEGER NOT NULL DEFAULT 0,
  model_used TEXT NOT NULL,
  tokens_used INTEGER NOT NULL DEFAULT 0,
  processing_ms INTEGER NOT NULL DEFAULT 0,
  started_at TEXT NOT NULL,
  completed_at TEXT NOT NULL
)
`;

export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_documents_batch_id ON documents(batch_id)',
  'CREATE INDEX IF NOT EXISTS idx_persons_confidence ON persons(confidence)',
  'CREATE INDEX IF NOT EXISTS idx_person_documents_document_id ON person_documents(document_id)',
  'CREATE INDEX IF NOT EXISTS idx_events_primary_location_id ON events(primary_location_id)',
  'CREATE INDEX IF NOT EXISTS idx_event_documents_document_id ON event_documents(document_id)',
  'CREATE INDEX IF NOT EXISTS idx_event_persons_person_id ON event_persons(person_id)',
  'CREATE INDEX IF NOT EXISTS idx_person_relationships_person_b_id ON person_relationships(person_b_id)',
  'CREATE INDEX IF NOT EXISTS idx_conflict_records_kind ON conflict_records(kind)',
  'CREATE INDEX IF NOT EXISTS idx_conflict_records_document_a_id ON conflict_records(document_a_id)',
  'CREATE INDEX IF NOT EXISTS idx_processing_log_batch_id ON processing_log(batch_id)',
] as const;

/** Tables in dependency order */
export const TABLE_DEFINITIONS = [
  { name: 'documents', sql: CREATE_DOCUMENTS_TABLE },
  { name: 'persons', sql: CREATE_PERSONS_TABLE },
  { name: 'locations', sql: CREATE_LOCATIONS_TABLE },
  { name: 'events', sql: CREATE_EVENTS_TABLE },
  { name: 'person_documents', sql: CREATE_PERSON_DOCUMENTS_TABLE },
  { name: 'event_documents', sql: CREATE_EVENT_DOCUMENTS_TABLE },
  { name: 'event_persons', sql: CREATE_EVENT_PERSONS_TABLE },
  { name: 'person_relationships', sql: CREATE_PERSON_RELATIONSHIPS_TABLE },
  { name: 'conflict_records', sql: CREATE_CONFLICT_RECORDS_TABLE },
  { name: 'processing_log', sql: CREATE_PROCESSING_LOG_TABLE },
] as const;

export const REQUIRED_TABLES = ['schema_version', ...TABLE_DEFINITIONS.map((t) => t.name)];

export const REQUIRED_INDEXES = CREATE_INDEXES.map((sql) => {
  const match = /CREATE INDEX IF NOT EXISTS (\w+)/.exec(sql);
  return match ? match[1] : sql;
});
