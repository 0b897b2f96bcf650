/**
 * Statistics operations for DatabaseService
 */

import type Database from 'better-sqlite3';
import { existsSync, statSync } from 'fs';
import type { DatabaseStats } from './types.js';

function count(db: Database.Database, sql: string): number {
  const row = db.prepare(sql).get() as { n: number | null };
  return row.n ?? 0;
}

/**
 * Live row counts and totals across all tables
 */
export function getStats(db: Database.Database, name: string, path: string): DatabaseStats {
  const confidenceRows = db
    .prepare('SELECT confidence, COUNT(*) AS n FROM persons GROUP BY confidence')
    .all() as Array<{ confidence: string; n: number }>;
  const byConfidence = { unverified: 0, indicated: 0, corroborated: 0, confirmed: 0 };
  for (const row of confidenceRows) {
    if (row.confidence === 'unverified') byConfidence.unverified = row.n;
    else if (row.confidence === 'indicated') byConfidence.indicated = row.n;
    else if (row.confidence === 'corroborated') byConfidence.corroborated = row.n;
    else if (row.confidence === 'confirmed') byConfidence.confirmed = row.n;
  }

  return {
    name,
    path,
    total_documents: count(db, 'SELECT COUNT(*) AS n FROM documents'),
    processed_documents: count(db, 'SELECT COUNT(*) AS n FROM documents WHERE is_processed = 1'),
    documents_requiring_review: count(
      db,
      'SELECT COUNT(*) AS n FROM documents WHERE requires_human_review = 1'
    ),
    total_persons: count(db, 'SELECT COUNT(*) AS n FROM persons'),
    persons_by_confidence: byConfidence,
    total_locations: count(db, 'SELECT COUNT(*) AS n FROM locations'),
    total_events: count(db, 'SELECT COUNT(*) AS n FROM events'),
    total_relationships: count(db, 'SELECT COUNT(*) AS n FROM person_relationships'),
    total_conflicts: count(db, 'SELECT COUNT(*) AS n FROM conflict_records'),
    victim_diversions: count(
      db,
      `SELECT COUNT(*) AS n FROM conflict_records WHERE kind = 'victim_diversion'`
    ),
    total_processing_runs: count(db, 'SELECT COUNT(*) AS n FROM processing_log'),
    total_tokens_used: count(db, 'SELECT SUM(tokens_used) AS n FROM processing_log'),
    storage_size_bytes: existsSync(path) ? statSync(path).size : 0,
  };
}
