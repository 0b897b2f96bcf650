/**
 * Unit tests for hashing and document references
 *
 * @module tests/unit/utils/hash
 */

import { describe, it, expect } from 'vitest';
import { computeHash, deriveDocumentReference } from '../../../src/utils/hash.js';

describe('computeHash', () => {
  it('returns the prefixed lowercase sha256 hex digest', () => {
    expect(computeHash('hello')).toBe(
      'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
    );
  });
});

describe('deriveDocumentReference', () => {
  it('is DOC- plus the first 16 upper-case hex characters of the digest', () => {
    expect(deriveDocumentReference('hello')).toBe('DOC-2CF24DBA5FB0A30E');
  });

  it('is stable and ignores surrounding whitespace', () => {
    const url = 'https://records.example.test/manifest-001.pdf';
    expect(deriveDocumentReference(url)).toBe(deriveDocumentReference(`  ${url}\n`));
    expect(deriveDocumentReference(url)).toMatch(/^DOC-[A-F0-9]{16}$/);
  });

  it('differs for different URLs', () => {
    expect(deriveDocumentReference('https://a.example.test/1')).not.toBe(
      deriveDocumentReference('https://a.example.test/2')
    );
  });
});
