/**
 * Location operations for DatabaseService. Keyed by name_key; confidence
 * only moves up, and a specific location_type replaces 'other'.
 */

import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';

import {
  confidenceRank,
  type LocationRecord,
  type LocationSummary,
  type LocationUpsert,
} from '../../../models/index.js';
import { rowToLocation, rowToLocationSummary } from './converters.js';
import { nowIso } from './helpers.js';
import type { LocationRow, LocationSummaryRow } from './types.js';

export function upsertLocation(db: Database.Database, location: LocationUpsert): LocationRecord {
  const now = nowIso();
  const row = db
    .prepare(
      `
    INSERT INTO locations (id, name_key, name, location_type, confidence, confidence_rank, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(name_key) DO UPDATE SET
      location_type = CASE WHEN excluded.location_type <> 'other'
        THEN excluded.location_type ELSE locations.location_type END,
      confidence = CASE WHEN excluded.confidence_rank > locations.confidence_rank
        THEN excluded.confidence ELSE locations.confidence END,
      confidence_rank = MAX(locations.confidence_rank, excluded.confidence_rank),
      updated_at = excluded.updated_at
    RETURNING *
  `
    )
    .get(
      uuidv4(),
      location.name_key,
      location.name,
      location.location_type,
      location.confidence,
      confidenceRank(location.confidence),
      now,
      now
    ) as LocationRow;

  return rowToLocation(row);
}

export function getLocationByKey(db: Database.Database, nameKey: string): LocationRecord | null {
  const row = db.prepare('SELECT * FROM locations WHERE name_key = ?').get(nameKey) as
    | LocationRow
    | undefined;
  return row ? rowToLocation(row) : null;
}

/**
 * Summaries (type, number of events placed there) for the given keys, in
 * key order. Unknown keys are absent.
 */
export function findLocationSummaries(
  db: Database.Database,
  nameKeys: string[]
): LocationSummary[] {
  if (nameKeys.length === 0) return [];
  const placeholders = nameKeys.map(() => '?').join(', ');
  const rows = db
    .prepare(
      `
    SELECT l.id, l.name_key, l.name, l.location_type,
           (SELECT COUNT(*) FROM events e WHERE e.primary_location_id = l.id) AS event_count
    FROM locations l
    WHERE l.name_key IN (${placeholders})
  `
    )
    .all(...nameKeys) as LocationSummaryRow[];

  const byKey = new Map(rows.map((row) => [row.name_key, rowToLocationSummary(row)]));
  return nameKeys.flatMap((key) => {
    const summary = byKey.get(key);
    return summary ? [summary] : [];
  });
}
