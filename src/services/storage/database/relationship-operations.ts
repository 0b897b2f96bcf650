/**
 * Relationship operations for DatabaseService
 *
 * A relationship is an unordered person pair stored as (lower id, higher id),
 * so (A, B) and (B, A) land on the same row. co_occurrence_count is the
 * number of distinct documents in source_document_ids: reprocessing a
 * document already on the row leaves both unchanged. evidence_strength can
 * only go up.
 */

import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';

import type { RelationshipObservation, RelationshipRecord } from '../../../models/index.js';
import { rowToRelationship } from './converters.js';
import { nowIso } from './helpers.js';
import { DatabaseError, DatabaseErrorCode, type RelationshipRow } from './types.js';

/** True when the incoming document is already recorded on the row */
const KNOWN_DOCUMENT_SQL = `EXISTS (
          SELECT 1 FROM json_each(person_relationships.source_document_ids)
          WHERE json_each.value = json_extract(excluded.source_document_ids, '$[0]')
        )`;

const strengthRankSql = (column: string): string =>
  `(CASE ${column} WHEN 'strong' THEN 2 WHEN 'moderate' THEN 1 ELSE 0 END)`;

/**
 * Canonical storage order for a person pair.
 *
 * @throws DatabaseError INVALID_RELATIONSHIP for a self-relationship
 */
export function orderPersonPair(a: string, b: string): [string, string] {
  if (a === b) {
    throw new DatabaseError(
      `Relationship endpoints must be two different persons (got ${a} twice)`,
      DatabaseErrorCode.INVALID_RELATIONSHIP
    );
  }
  return a < b ? [a, b] : [b, a];
}

export function upsertRelationship(
  db: Database.Database,
  observation: RelationshipObservation
): RelationshipRecord {
  const [personA, personB] = orderPersonPair(observation.person_a_id, observation.person_b_id);
  const now = nowIso();

  const row = db
    .prepare(
      `
    INSERT INTO person_relationships (
      id, person_a_id, person_b_id, relationship_type, evidence_strength,
      co_occurrence_count, source_document_ids, notes, created_at, updated_at
    ) VALUES (?, ?, ?, ?, ?, 1, json_array(?), ?, ?, ?)
    ON CONFLICT(person_a_id, person_b_id) DO UPDATE SET
      co_occurrence_count = CASE WHEN ${KNOWN_DOCUMENT_SQL}
        THEN person_relationships.co_occurrence_count
        ELSE person_relationships.co_occurrence_count + 1 END,
      evidence_strength = CASE
        WHEN ${strengthRankSql('excluded.evidence_strength')} > ${strengthRankSql('person_relationships.evidence_strength')}
        THEN excluded.evidence_strength ELSE person_relationships.evidence_strength END,
      relationship_type = CASE WHEN excluded.relationship_type <> 'unknown'
        THEN excluded.relationship_type ELSE person_relationships.relationship_type END,
      source_document_ids = CASE
        WHEN ${KNOWN_DOCUMENT_SQL}
        THEN person_relationships.source_document_ids
        ELSE json_insert(person_relationships.source_document_ids, '$[#]',
                         json_extract(excluded.source_document_ids, '$[0]'))
      END,
      notes = COALESCE(excluded.notes, person_relationships.notes),
      updated_at = excluded.updated_at
    RETURNING *
  `
    )
    .get(
      uuidv4(),
      personA,
      personB,
      observation.relationship_type,
      observation.evidence_strength,
      observation.document_id,
      observation.notes,
      now,
      now
    ) as RelationshipRow;

  return rowToRelationship(row);
}

/** Relationship for a pair given in either order, or null */
export function getRelationship(
  db: Database.Database,
  personId1: string,
  personId2: string
): RelationshipRecord | null {
  const [personA, personB] = orderPersonPair(personId1, personId2);
  const row = db
    .prepare('SELECT * FROM person_relationships WHERE person_a_id = ? AND person_b_id = ?')
    .get(personA, personB) as RelationshipRow | undefined;
  return row ? rowToRelationship(row) : null;
}

export function listRelationshipsForPerson(
  db: Database.Database,
  personId: string
): RelationshipRecord[] {
  const rows = db
    .prepare(
      `SELECT * FROM person_relationships WHERE person_a_id = ? OR person_b_id = ?
       ORDER BY co_occurrence_count DESC, updated_at DESC`
    )
    .all(personId, personId) as RelationshipRow[];
  return rows.map(rowToRelationship);
}
