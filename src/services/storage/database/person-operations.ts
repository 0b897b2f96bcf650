/**
 * Person operations for DatabaseService
 *
 * Persons are keyed by name_key. Confidence only moves up the lattice:
 * an upsert keeps the higher of the stored and incoming level, and
 * power_corroboration always follows the stored level.
 */

import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';

import {
  confidenceRank,
  corroborationScore,
  type ConfidenceLevel,
  type PersonRecord,
  type PersonSummary,
  type PersonUpsert,
} from '../../../models/index.js';
import { rowToPerson, rowToPersonSummary } from './converters.js';
import { nowIso, runWithForeignKeyCheck } from './helpers.js';
import type { PersonRow, PersonSummaryRow } from './types.js';

export function upsertPerson(db: Database.Database, person: PersonUpsert): PersonRecord {
  const now = nowIso();
  const row = db
    .prepare(
      `
    INSERT INTO persons (
      id, name_key, full_name, confidence, confidence_rank, redaction_status, name_recovered,
      power_public_profile, power_institutional, power_network_centrality, power_corroboration,
      category, upgrade_gap_note, flagged_for_review, victim_protected, is_victim,
      created_at, updated_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 0, 0, ?, ?)
    ON CONFLICT(name_key) DO UPDATE SET
      confidence = CASE WHEN excluded.confidence_rank > persons.confidence_rank
        THEN excluded.confidence ELSE persons.confidence END,
      power_corroboration = CASE WHEN excluded.confidence_rank > persons.confidence_rank
        THEN excluded.power_corroboration ELSE persons.power_corroboration END,
      upgrade_gap_note = CASE WHEN excluded.confidence_rank >= persons.confidence_rank
        THEN excluded.upgrade_gap_note ELSE persons.upgrade_gap_note END,
      confidence_rank = MAX(persons.confidence_rank, excluded.confidence_rank),
      redaction_status = CASE WHEN 'partial' IN (persons.redaction_status, excluded.redaction_status)
        THEN 'partial' ELSE 'none' END,
      name_recovered = MAX(persons.name_recovered, excluded.name_recovered),
      power_public_profile = COALESCE(excluded.power_public_profile, persons.power_public_profile),
      power_institutional = COALESCE(excluded.power_institutional, persons.power_institutional),
      power_network_centrality = COALESCE(excluded.power_network_centrality, persons.power_network_centrality),
      category = COALESCE(excluded.category, persons.category),
      flagged_for_review = MAX(persons.flagged_for_review, excluded.flagged_for_review),
      updated_at = excluded.updated_at
    RETURNING *
  `
    )
    .get(
      uuidv4(),
      person.name_key,
      person.full_name,
      person.confidence,
      confidenceRank(person.confidence),
      person.redaction_status,
      person.name_recovered ? 1 : 0,
      person.power_public_profile,
      person.power_institutional,
      person.power_network_centrality,
      corroborationScore(person.confidence),
      person.category,
      person.upgrade_gap_note,
      person.flagged_for_review ? 1 : 0,
      now,
      now
    ) as PersonRow;

  return rowToPerson(row);
}

export function getPerson(db: Database.Database, id: string): PersonRecord | null {
  const row = db.prepare('SELECT * FROM persons WHERE id = ?').get(id) as PersonRow | undefined;
  return row ? rowToPerson(row) : null;
}

export function getPersonByKey(db: Database.Database, nameKey: string): PersonRecord | null {
  const row = db.prepare('SELECT * FROM persons WHERE name_key = ?').get(nameKey) as
    | PersonRow
    | undefined;
  return row ? rowToPerson(row) : null;
}

/**
 * Summaries (confidence, category, linked document count) for the given
 * name keys, in the order the keys were given. Unknown keys are absent.
 */
export function findPersonSummaries(db: Database.Database, nameKeys: string[]): PersonSummary[] {
  if (nameKeys.length === 0) return [];
  const placeholders = nameKeys.map(() => '?').join(', ');
  const rows = db
    .prepare(
      `
    SELECT p.id, p.name_key, p.full_name, p.confidence, p.category,
           (SELECT COUNT(*) FROM person_documents pd WHERE pd.person_id = p.id) AS document_count
    FROM persons p
    WHERE p.name_key IN (${placeholders})
  `
    )
    .all(...nameKeys) as PersonSummaryRow[];

  const byKey = new Map(rows.map((row) => [row.name_key, rowToPersonSummary(row)]));
  return nameKeys.flatMap((key) => {
    const summary = byKey.get(key);
    return summary ? [summary] : [];
  });
}

/**
 * Idempotent person-document link. A repeated link keeps the higher
 * confidence of the two observations.
 */
export function linkPersonDocument(
  db: Database.Database,
  personId: string,
  documentId: string,
  confidence: ConfidenceLevel
): void {
  const stmt = db.prepare(`
    INSERT INTO person_documents (id, person_id, document_id, confidence, created_at)
    VALUES (?, ?, ?, ?, ?)
    ON CONFLICT(person_id, document_id) DO UPDATE SET
      confidence = CASE WHEN ${rankSql('excluded.confidence')} > ${rankSql('person_documents.confidence')}
        THEN excluded.confidence ELSE person_documents.confidence END
  `);
  runWithForeignKeyCheck(
    stmt,
    [uuidv4(), personId, documentId, confidence, nowIso()],
    `linking person ${personId} to document ${documentId}`
  );
}

export function countPersonDocuments(db: Database.Database, personId: string): number {
  const row = db
    .prepare('SELECT COUNT(*) AS n FROM person_documents WHERE person_id = ?')
    .get(personId) as { n: number };
  return row.n;
}

/** SQL expression ranking a confidence column on the lattice */
function rankSql(column: string): string {
  return `(CASE ${column} WHEN 'confirmed' THEN 3 WHEN 'corroborated' THEN 2 WHEN 'indicated' THEN 1 ELSE 0 END)`;
}
