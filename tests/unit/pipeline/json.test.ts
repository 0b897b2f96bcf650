/**
 * Unit tests for oracle JSON recovery
 *
 * @module tests/unit/pipeline/json
 */

import { describe, it, expect } from 'vitest';

import { hasSignatureKeys, parseOracleJson } from '../../../src/services/pipeline/json.js';

describe('parseOracleJson', () => {
  it('parses a bare JSON object', () => {
    expect(parseOracleJson('{"document_type": "email"}')).toEqual({
      ok: true,
      value: { document_type: 'email' },
    });
  });

  it('strips markdown code fences', () => {
    expect(parseOracleJson('```json\n{"a": 1}\n```')).toEqual({ ok: true, value: { a: 1 } });
    expect(parseOracleJson('```\n{"a": 2}\n```')).toEqual({ ok: true, value: { a: 2 } });
  });

  it('recovers the outermost object from surrounding prose', () => {
    const text = 'Here is the result: {"a": {"b": 2}} Let me know if you need more.';
    expect(parseOracleJson(text)).toEqual({ ok: true, value: { a: { b: 2 } } });
  });

  it('reports empty output as unparseable', () => {
    expect(parseOracleJson('')).toEqual({ ok: false, raw: '' });
    expect(parseOracleJson('   ')).toEqual({ ok: false, raw: '   ' });
  });

  it('reports text without an object as unparseable', () => {
    expect(parseOracleJson('I cannot help with that')).toEqual({
      ok: false,
      raw: 'I cannot help with that',
    });
  });

  it('rejects a top-level array', () => {
    expect(parseOracleJson('[1, 2]').ok).toBe(false);
  });

  it('rejects a broken object', () => {
    expect(parseOracleJson('{"a": ').ok).toBe(false);
  });
});

describe('hasSignatureKeys', () => {
  it('is true when any signature key is present', () => {
    expect(hasSignatureKeys({ persons_found: [] }, ['document_type', 'persons_found'])).toBe(true);
  });

  it('is false for an unrelated object', () => {
    expect(hasSignatureKeys({ answer: 42 }, ['document_type', 'persons_found'])).toBe(false);
  });
});
