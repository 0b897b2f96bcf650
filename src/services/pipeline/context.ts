/**
 * Context assembler: what the store already knows about the names a
 * document mentions, rendered as plain text for the verification stage.
 *
 * Protected names, and names the extraction stage flagged as possible
 * victims, are dropped before lookup, so they are never queried or echoed
 * back to the oracle.
 *
 * @module services/pipeline/context
 */

import type { RecordStore } from '../storage/types.js';
import { isUsableNameKey, toNameKey } from '../../utils/names.js';
import type { PipelineConfig } from './config.js';
import { matchesProtectedTerm } from './victim-protection.js';

export const NO_CONTEXT_SENTINEL = 'No existing records found for these entities.';

type ContextStore = Pick<RecordStore, 'findPersonSummaries' | 'findLocationSummaries'>;

/**
 * First-seen, de-duplicated usable keys, minus protected and excluded names, capped.
 */
function lookupKeys(
  names: readonly string[],
  protectedTerms: readonly string[],
  limit: number,
  excludedKeys: ReadonlySet<string> = new Set()
): string[] {
  const keys: string[] = [];
  const seen = new Set<string>();
  for (const name of names) {
    const key = toNameKey(name);
    if (!isUsableNameKey(key) || seen.has(key)) continue;
    seen.add(key);
    if (excludedKeys.has(key) || matchesProtectedTerm(key, protectedTerms)) continue;
    keys.push(key);
    if (keys.length >= limit) break;
  }
  return keys;
}

export function assembleContext(
  store: ContextStore,
  personNames: readonly string[],
  locationNames: readonly string[],
  config: Pick<PipelineConfig, 'protectedTerms' | 'contextPersonLimit' | 'contextLocationLimit'>,
  flaggedPersonKeys: ReadonlySet<string> = new Set()
): string {
  const persons = store.findPersonSummaries(
    lookupKeys(personNames, config.protectedTerms, config.contextPersonLimit, flaggedPersonKeys)
  );
  const locations = store.findLocationSummaries(
    lookupKeys(locationNames, config.protectedTerms, config.contextLocationLimit)
  );

  const sections: string[] = [];
  if (persons.length > 0) {
    sections.push(
      [
        'KNOWN PERSONS IN DATABASE:',
        ...persons.map(
          (p) =>
            ` - ${p.full_name} | confidence: ${p.confidence} | docs: ${p.document_count} | category: ${p.category ?? 'unknown'}`
        ),
      ].join('\n')
    );
  }
  if (locations.length > 0) {
    sections.push(
      [
        'KNOWN LOCATIONS IN DATABASE:',
        ...locations.map((l) => ` - ${l.name} | type: ${l.location_type} | events: ${l.event_count}`),
      ].join('\n')
    );
  }

  return sections.length > 0 ? sections.join('\n\n') : NO_CONTEXT_SENTINEL;
}
