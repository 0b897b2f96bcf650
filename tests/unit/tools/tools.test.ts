/**
 * Unit tests for the MCP tool handlers
 *
 * Server state is configured with a temp-dir database and in-process
 * collaborators; handlers are called directly and their JSON parsed.
 *
 * @module tests/unit/tools/tools
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { z } from 'zod';

import { configureServer, resetServerState } from '../../../src/server/state.js';
import { DocumentFetchError } from '../../../src/services/documents/index.js';
import { createInferenceConfig } from '../../../src/services/inference/index.js';
import type { TelemetryProps } from '../../../src/services/pipeline/index.js';
import { handleProcessBatch, handleProcessDocument } from '../../../src/tools/pipeline.js';
import { handlePersonGet, handleReviewQueue, handleStats } from '../../../src/tools/records.js';
import type { ToolResponse } from '../../../src/tools/shared.js';
import { deriveDocumentReference } from '../../../src/utils/hash.js';
import {
  cleanupTestDir,
  createTestConfig,
  createTestDir,
  createUniqueName,
  FakeSource,
  manifestOracle,
} from '../helpers.js';

const GOOD_URL = 'https://records.example.test/manifest-001.pdf';
const MISSING_URL = 'https://records.example.test/missing.pdf';

const ToolResultSchema = z.object({
  success: z.boolean(),
  data: z.record(z.unknown()).optional(),
  error: z
    .object({
      category: z.string(),
      message: z.string(),
      recovery: z.object({ tool: z.string(), hint: z.string() }),
    })
    .optional(),
});

function parseResponse(response: ToolResponse): z.infer<typeof ToolResultSchema> {
  return ToolResultSchema.parse(JSON.parse(response.content[0]?.text ?? ''));
}

describe('MCP tools', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTestDir('tools-');
    configureServer({
      config: createTestConfig({ storagePath: dir, databaseName: createUniqueName('tools') }),
      inferenceConfig: createInferenceConfig(),
      source: new FakeSource(
        new Map([[MISSING_URL, new DocumentFetchError('Document fetch failed: HTTP 404 Not Found', MISSING_URL, 404)]])
      ),
      oracle: manifestOracle(),
      telemetry: { track: vi.fn(async (_name: string, _props: TelemetryProps): Promise<void> => {}) },
    });
  });

  afterEach(() => {
    resetServerState();
    cleanupTestDir(dir);
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // PIPELINE TOOLS
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('radar_process_document', () => {
    it('processes a document and returns the write summary', async () => {
      const response = await handleProcessDocument({ url: GOOD_URL });
      const result = parseResponse(response);

      expect(response.isError).toBeUndefined();
      expect(result.success).toBe(true);
      expect(result.data).toMatchObject({
        url: GOOD_URL,
        status: 'success',
        documentType: 'flight_manifest',
        intelligenceValue: 'medium',
        requiresHumanReview: false,
        truncated: false,
        write: {
          documentReference: deriveDocumentReference(GOOD_URL),
          personsWritten: 2,
          victimFlags: 1,
          tokensUsed: 45,
        },
      });
      expect(result.data?.batch_id).toMatch(/^manual-/);
    });

    it('reports a fetch failure with its category', async () => {
      const response = await handleProcessDocument({ url: MISSING_URL, batch_label: 'march' });
      const result = parseResponse(response);

      expect(response.isError).toBe(true);
      expect(result.error).toMatchObject({
        category: 'DOCUMENT_FETCH_ERROR',
        message: 'Document fetch failed: HTTP 404 Not Found',
        recovery: { tool: 'radar_process_document' },
      });
    });

    it('rejects a relative URL', async () => {
      const result = parseResponse(await handleProcessDocument({ url: 'manifest-001.pdf' }));

      expect(result.error?.category).toBe('VALIDATION_ERROR');
      expect(result.error?.message).toContain('Document reference must be an absolute URL');
    });
  });

  describe('radar_process_batch', () => {
    it('continues past a failed document', async () => {
      const result = parseResponse(
        await handleProcessBatch({ urls: [GOOD_URL, MISSING_URL], batch_label: 'march', delay_seconds: 0 })
      );

      expect(result.data).toMatchObject({
        batchLabel: 'march',
        total: 2,
        successful: 1,
        failed: 1,
        summary: '1/2',
        results: [
          { url: GOOD_URL, status: 'success' },
          { url: MISSING_URL, status: 'error', error: 'Document fetch failed: HTTP 404 Not Found' },
        ],
      });
    });

    it('rejects an empty list', async () => {
      const result = parseResponse(await handleProcessBatch({ urls: [], batch_label: 'march' }));

      expect(result.error).toMatchObject({
        category: 'VALIDATION_ERROR',
        message: 'urls: At least one document URL is required',
      });
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // RECORD TOOLS
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('radar_review_queue', () => {
    it('lists conflicts with the document reference', async () => {
      await handleProcessDocument({ url: GOOD_URL });

      const all = parseResponse(await handleReviewQueue({}));
      expect(all.data).toMatchObject({ kind: 'all', count: 2 });

      const diversions = parseResponse(await handleReviewQueue({ kind: 'victim_diversion' }));
      expect(diversions.data).toMatchObject({
        kind: 'victim_diversion',
        count: 1,
        conflicts: [
          {
            kind: 'victim_diversion',
            document_a_claim: 'Possible victim: Jane Doe',
            document_reference: deriveDocumentReference(GOOD_URL),
          },
        ],
      });
    });

    it('is empty before any document is processed', async () => {
      const result = parseResponse(await handleReviewQueue({ limit: 10 }));

      expect(result.data).toEqual({ kind: 'all', count: 0, conflicts: [] });
    });
  });

  describe('radar_person_get', () => {
    it('finds a person by any spacing and case of the name', async () => {
      await handleProcessDocument({ url: GOOD_URL });

      const result = parseResponse(await handlePersonGet({ name: '  john   SMITH ' }));

      expect(result.data).toMatchObject({
        person: { full_name: 'John Smith', confidence: 'indicated' },
        document_count: 1,
        relationship_count: 1,
        relationships: [
          {
            counterpart: 'Robert Hale',
            relationship_type: 'co_traveler',
            evidence_strength: 'weak',
            co_occurrence_count: 1,
            document_count: 1,
          },
        ],
      });
    });

    it('refuses a protected name without echoing it', async () => {
      const response = await handlePersonGet({ name: 'Jane Doe' });
      const result = parseResponse(response);

      expect(response.isError).toBe(true);
      expect(result.error?.category).toBe('PROTECTED_NAME');
      expect(result.error?.message).not.toContain('Jane');
    });

    it('reports an unknown person', async () => {
      const result = parseResponse(await handlePersonGet({ name: 'Nobody Recorded' }));

      expect(result.error).toMatchObject({
        category: 'PERSON_NOT_FOUND',
        message: 'No stored person matches this name',
      });
    });
  });

  describe('radar_stats', () => {
    it('reports counts after a processed document', async () => {
      await handleProcessDocument({ url: GOOD_URL });

      const result = parseResponse(await handleStats({}));

      expect(result.data).toMatchObject({
        total_documents: 1,
        processed_documents: 1,
        total_persons: 2,
        persons_by_confidence: { unverified: 0, indicated: 1, corroborated: 0, confirmed: 1 },
        total_locations: 2,
        total_events: 1,
        total_relationships: 1,
        total_conflicts: 2,
        victim_diversions: 1,
        total_processing_runs: 1,
        total_tokens_used: 45,
      });
    });

    it('reports a configuration error when the server is not configured', async () => {
      resetServerState();

      const result = parseResponse(await handleStats({}));

      expect(result.error?.category).toBe('CONFIGURATION_ERROR');
    });
  });
});
