/**
 * Victim-protection predicate.
 *
 * A name is diverted when any stage flagged it as a possible victim or when
 * it contains a protected term. The writer applies this to every verified
 * person regardless of what the extraction policy was asked to suppress.
 *
 * @module services/pipeline/victim-protection
 */

import type { ExtractionResult, VerifiedPerson } from '../../models/index.js';
import { toNameKey } from '../../utils/names.js';

export type DiversionReason = 'flagged' | 'lexicon';

/**
 * Case-insensitive substring match against the protected-term lexicon.
 */
export function matchesProtectedTerm(name: string, protectedTerms: readonly string[]): boolean {
  const key = toNameKey(name);
  return protectedTerms.some((term) => key.includes(term.toLowerCase()));
}

/**
 * Name keys the extraction stage marked as possible victims: persons with
 * `possible_victim` (under either their normalized or as-written name) and
 * every entry of `victim_flags`.
 */
export function collectFlaggedVictimKeys(extraction: ExtractionResult): Set<string> {
  const keys = new Set<string>();
  for (const person of extraction.persons_found) {
    if (!person.possible_victim) continue;
    for (const name of [person.name, person.name_as_written]) {
      const key = toNameKey(name);
      if (key) keys.add(key);
    }
  }
  for (const flagged of extraction.victim_flags) {
    const key = toNameKey(flagged);
    if (key) keys.add(key);
  }
  return keys;
}

/**
 * Why a verified person must be diverted, or null when it may be written.
 */
export function diversionReason(
  person: Pick<VerifiedPerson, 'name' | 'possible_victim'>,
  flaggedKeys: ReadonlySet<string>,
  protectedTerms: readonly string[]
): DiversionReason | null {
  if (person.possible_victim || flaggedKeys.has(toNameKey(person.name))) {
    return 'flagged';
  }
  if (matchesProtectedTerm(person.name, protectedTerms)) {
    return 'lexicon';
  }
  return null;
}
