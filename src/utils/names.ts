/**
 * Natural-key normalization for person and location names.
 *
 * @module utils/names
 */

/** Keys shorter than this are noise ("A", "-"), not names */
export const MIN_NAME_KEY_LENGTH = 2;

/**
 * Display form: NFKC, trimmed, internal whitespace collapsed.
 */
export function normalizeDisplayName(name: string): string {
  return name.normalize('NFKC').replace(/\s+/g, ' ').trim();
}

/**
 * Natural key: the display form lower-cased. "  John   SMITH " and
 * "john smith" share a key and therefore a row.
 */
export function toNameKey(name: string): string {
  return normalizeDisplayName(name).toLowerCase();
}

export function isUsableNameKey(key: string): boolean {
  return key.length >= MIN_NAME_KEY_LENGTH;
}
