/**
 * SHA-256 hashing and the content-addressed document reference.
 *
 * @module utils/hash
 */

import crypto from 'crypto';

/**
 * Hash prefix used for all SHA-256 hashes in this system
 */
const HASH_PREFIX = 'sha256:';

/**
 * Compute SHA-256 hash of content
 *
 * @returns Hash in format 'sha256:' + 64-char lowercase hex string
 * @example
 * computeHash('hello')
 * // Returns: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string | Buffer): string {
  const hash = crypto.createHash('sha256').update(content).digest('hex');
  return HASH_PREFIX + hash;
}

/**
 * Derive the stable document reference for a source URL.
 *
 * 'DOC-' + the first 16 hex characters (upper-cased) of the URL's SHA-256.
 * The same URL always yields the same reference, so reprocessing updates the
 * existing document row. Two distinct URLs sharing a reference is detected at
 * write time by comparing the stored source_url.
 *
 * @example
 * deriveDocumentReference('https://example.org/a.pdf') // 'DOC-' + 16 hex chars
 */
export function deriveDocumentReference(url: string): string {
  const hex = computeHash(url.trim()).slice(HASH_PREFIX.length, HASH_PREFIX.length + 16);
  return `DOC-${hex.toUpperCase()}`;
}
