/**
 * Unit tests for MCP error categorization and response formatting
 *
 * @module tests/unit/server/errors
 */

import { describe, it, expect } from 'vitest';

import {
  formatErrorResponse,
  getRecoveryHint,
  MCPError,
  personNotFoundError,
  protectedNameError,
} from '../../../src/server/errors.js';
import { DocumentFetchError } from '../../../src/services/documents/index.js';
import { CircuitBreakerOpenError, InferenceError } from '../../../src/services/inference/index.js';
import { DatabaseError, DatabaseErrorCode } from '../../../src/services/storage/index.js';
import { formatResponse, handleError } from '../../../src/tools/shared.js';
import { ValidationError } from '../../../src/utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CATEGORIZATION
// ═══════════════════════════════════════════════════════════════════════════════

describe('MCPError.fromUnknown', () => {
  it('returns an MCPError unchanged', () => {
    const original = personNotFoundError();
    expect(MCPError.fromUnknown(original)).toBe(original);
  });

  it.each([
    [new ValidationError('bad input'), 'VALIDATION_ERROR'],
    [new DocumentFetchError('gone', 'https://records.example.test/a.pdf', 404), 'DOCUMENT_FETCH_ERROR'],
    [new InferenceError('Ollama API error 400: Bad Request. ', 400), 'INFERENCE_ERROR'],
    [new CircuitBreakerOpenError('open', 1000), 'INFERENCE_UNAVAILABLE'],
    [new Error('unexpected'), 'INTERNAL_ERROR'],
  ])('maps %s to %s', (error, category) => {
    expect(MCPError.fromUnknown(error).category).toBe(category);
  });

  it('uses the database error code where it is more specific', () => {
    const error = MCPError.fromUnknown(new DatabaseError('missing', DatabaseErrorCode.DATABASE_NOT_FOUND));

    expect(error.category).toBe('DATABASE_NOT_FOUND');
    expect(error.details).toEqual({ originalName: 'DatabaseError', errorCode: 'DATABASE_NOT_FOUND' });
  });

  it('falls back to STORAGE_ERROR for other database codes', () => {
    const error = MCPError.fromUnknown(
      new DatabaseError('collision', DatabaseErrorCode.DOCUMENT_REFERENCE_COLLISION)
    );

    expect(error.category).toBe('STORAGE_ERROR');
  });

  it('wraps a thrown non-error value', () => {
    const error = MCPError.fromUnknown('boom');

    expect(error.category).toBe('INTERNAL_ERROR');
    expect(error.message).toBe('boom');
    expect(error.details).toEqual({ originalValue: 'boom' });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

describe('formatErrorResponse', () => {
  it('includes the recovery hint for the category', () => {
    expect(formatErrorResponse(personNotFoundError())).toEqual({
      success: false,
      error: {
        category: 'PERSON_NOT_FOUND',
        message: 'No stored person matches this name',
        recovery: getRecoveryHint('PERSON_NOT_FOUND'),
        details: undefined,
      },
    });
  });

  it('points protected-name refusals at the review queue', () => {
    expect(formatErrorResponse(protectedNameError()).error.recovery.tool).toBe('radar_review_queue');
  });
});

describe('handleError', () => {
  it('returns an error tool response', () => {
    const response = handleError(new ValidationError('url: Required'));

    expect(response.isError).toBe(true);
    expect(JSON.parse(response.content[0]?.text ?? '')).toMatchObject({
      success: false,
      error: { category: 'VALIDATION_ERROR', message: 'url: Required' },
    });
  });
});

describe('formatResponse', () => {
  it('passes small results through', () => {
    const response = formatResponse({ success: true, data: { count: 1 } });

    expect(JSON.parse(response.content[0]?.text ?? '')).toEqual({ success: true, data: { count: 1 } });
  });

  it('caps long arrays in oversized results', () => {
    const rows = Array.from({ length: 60 }, () => 'x'.repeat(20_000));

    const parsed: unknown = JSON.parse(formatResponse({ success: true, data: { rows } }).content[0]?.text ?? '');

    expect(parsed).toMatchObject({
      success: true,
      data: { _rows_total: 60 },
      _response_truncated: {
        reason: 'Response exceeded 700KB limit',
        truncated_fields: ['data.rows (60 → 50)'],
      },
    });
    expect(parsed).toHaveProperty('data.rows.length', 50);
  });
});
