/**
 * Unit tests for the batch orchestrator
 *
 * @module tests/unit/pipeline/orchestrator
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { DocumentFetchError } from '../../../src/services/documents/index.js';
import {
  createBatchId,
  PipelineOrchestrator,
  type OrchestratorDeps,
  type TelemetryProps,
} from '../../../src/services/pipeline/index.js';
import type { DatabaseService } from '../../../src/services/storage/index.js';
import { ValidationError } from '../../../src/utils/validation.js';
import {
  cleanupTestDir,
  createTestConfig,
  createTestDatabase,
  createTestDir,
  FakeSource,
  manifestOracle,
  TEST_MODELS,
} from '../helpers.js';

const URLS = [
  'https://records.example.test/manifest-001.pdf',
  'https://records.example.test/manifest-002.pdf',
  'https://records.example.test/manifest-003.pdf',
];

describe('createBatchId', () => {
  it('prefixes a uuid with the label', () => {
    expect(createBatchId('march-release')).toMatch(/^march-release-[0-9a-f-]{36}$/);
  });
});

describe('PipelineOrchestrator', () => {
  let dir: string;
  let db: DatabaseService;

  beforeEach(() => {
    dir = createTestDir('orchestrator-');
    db = createTestDatabase(dir);
  });

  afterEach(() => {
    db.close();
    cleanupTestDir(dir);
  });

  function build(overrides: Partial<OrchestratorDeps> = {}) {
    const oracle = manifestOracle();
    const source = new FakeSource(
      new Map([[URLS[1] ?? '', new DocumentFetchError('Document fetch failed: HTTP 404 Not Found', URLS[1] ?? '', 404)]])
    );
    const sleep = vi.fn(async (_ms: number): Promise<void> => {});
    const track = vi.fn(async (_name: string, _props: TelemetryProps): Promise<void> => {});
    const orchestrator = new PipelineOrchestrator({
      source,
      oracle,
      store: db,
      config: createTestConfig(),
      telemetry: { track },
      sleep,
      ...overrides,
    });
    return { orchestrator, oracle, source, sleep, track };
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // SINGLE DOCUMENT
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('processDocument', () => {
    it('runs the three stages in order and writes the result', async () => {
      const { orchestrator, oracle } = build();

      const result = await orchestrator.processDocument(URLS[0] ?? '', 'manual-1');

      expect(oracle.requests.map((r) => r.model)).toEqual([
        TEST_MODELS.extraction,
        TEST_MODELS.verification,
        TEST_MODELS.decision,
      ]);
      expect(result).toMatchObject({
        url: URLS[0],
        status: 'success',
        documentType: 'flight_manifest',
        intelligenceValue: 'medium',
        requiresHumanReview: false,
        truncated: false,
        write: { personsWritten: 2, victimFlags: 1, tokensUsed: 45 },
      });
    });

    it('applies stage post-processing before writing', async () => {
      const { orchestrator } = build();
      await orchestrator.processDocument(URLS[0] ?? '', 'manual-1');

      expect(db.getPersonByKey('john smith')?.category).toBe('finance');
      expect(db.getPersonByKey('robert hale')?.upgrade_gap_note).toBeNull();
    });

    it('feeds stored knowledge into the next document', async () => {
      const { orchestrator, oracle } = build();
      await orchestrator.processDocument(URLS[0] ?? '', 'manual-1');
      await orchestrator.processDocument(URLS[2] ?? '', 'manual-1');

      const firstContext = oracle.requests[1]?.context ?? '';
      const secondContext = oracle.requests[4]?.context ?? '';
      expect(firstContext).toContain('EXISTING RECORDS:\nNo existing records found for these entities.');
      expect(secondContext).toContain(
        [
          'KNOWN PERSONS IN DATABASE:',
          ' - John Smith | confidence: indicated | docs: 1 | category: finance',
          ' - Robert Hale | confidence: confirmed | docs: 1 | category: other',
        ].join('\n')
      );
      expect(secondContext).not.toContain(' - Jane Doe |');
    });

    it('propagates a fetch failure', async () => {
      const { orchestrator } = build();
      await expect(orchestrator.processDocument(URLS[1] ?? '', 'manual-1')).rejects.toThrow(
        DocumentFetchError
      );
      expect(db.getStats().total_documents).toBe(0);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // BATCH
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('processBatch', () => {
    it('isolates a failing document and reports a partial summary', async () => {
      const { orchestrator, source } = build();

      const batch = await orchestrator.processBatch(URLS, 'march-release', { delayMs: 250 });

      expect(source.fetched).toEqual(URLS);
      expect(batch.batchLabel).toBe('march-release');
      expect(batch.batchId.startsWith('march-release-')).toBe(true);
      expect(batch).toMatchObject({ total: 3, successful: 2, failed: 1, summary: '2/3' });
      expect(batch.results.map((r) => r.status)).toEqual(['success', 'error', 'success']);
      expect(batch.results[1]).toEqual({
        url: URLS[1],
        status: 'error',
        error: 'Document fetch failed: HTTP 404 Not Found',
      });
    });

    it('sleeps only between documents', async () => {
      const { orchestrator, sleep } = build();
      await orchestrator.processBatch(URLS, 'march-release', { delayMs: 250 });

      expect(sleep).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenNthCalledWith(1, 250);
      expect(sleep).toHaveBeenNthCalledWith(2, 250);
    });

    it('uses the configured delay by default', async () => {
      const { orchestrator, sleep } = build({ config: createTestConfig({ batchDelayMs: 0 }) });
      await orchestrator.processBatch(URLS, 'march-release');
      expect(sleep).not.toHaveBeenCalled();
    });

    it('accumulates across documents', async () => {
      const { orchestrator } = build();
      const batch = await orchestrator.processBatch(URLS, 'march-release', { delayMs: 0 });

      const john = db.getPersonByKey('john smith');
      const robert = db.getPersonByKey('robert hale');
      const relationship = db.getRelationship(john?.id ?? '', robert?.id ?? '');
      expect(relationship?.co_occurrence_count).toBe(2);
      expect(relationship?.source_document_ids).toHaveLength(2);

      const documents = db.listDocuments({ batchId: batch.batchId });
      expect(documents).toHaveLength(2);

      expect(db.getStats()).toMatchObject({
        total_documents: 2,
        total_persons: 2,
        persons_by_confidence: { unverified: 0, indicated: 1, corroborated: 0, confirmed: 1 },
        victim_diversions: 2,
        total_processing_runs: 2,
        total_tokens_used: 90,
      });
    });

    it('emits anonymous telemetry per document', async () => {
      const { orchestrator, track } = build();
      await orchestrator.processBatch(URLS, 'march-release', { delayMs: 0 });

      expect(track).toHaveBeenCalledTimes(3);
      expect(track).toHaveBeenNthCalledWith(1, 'document_processed', {
        batch_label: 'march-release',
        status: 'success',
        document_type: 'flight_manifest',
        persons: 2,
        locations: 2,
        events: 1,
        relationships: 1,
        conflicts: 1,
        victim_flags: 1,
        tokens: 45,
      });
      expect(track).toHaveBeenNthCalledWith(2, 'document_failed', {
        batch_label: 'march-release',
        status: 'error',
        error_type: 'DocumentFetchError',
      });
    });

    it('validates input before processing anything', async () => {
      const { orchestrator, source } = build();

      await expect(orchestrator.processBatch([], 'march-release')).rejects.toThrow(ValidationError);
      await expect(orchestrator.processBatch(['not a url'], 'march-release')).rejects.toThrow(
        ValidationError
      );
      await expect(orchestrator.processBatch(URLS, '   ')).rejects.toThrow(ValidationError);
      expect(source.fetched).toEqual([]);
    });
  });
});
