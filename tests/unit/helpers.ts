/**
 * Shared test helpers
 *
 * Temp-dir databases, an in-process oracle and document source, and the
 * flight-manifest fixtures.
 *
 * @module tests/unit/helpers
 */

import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';

import {
  DecisionResultSchema,
  ExtractionResultSchema,
  VerificationResultSchema,
  type DecisionResult,
  type ExtractionResult,
  type NormalizedDocument,
  type VerificationResult,
} from '../../src/models/index.js';
import type { DocumentSource } from '../../src/services/documents/index.js';
import type { InferenceRequest, InferenceResponse, Oracle } from '../../src/services/inference/index.js';
import { createPipelineConfig, type PipelineConfig } from '../../src/services/pipeline/index.js';
import { DatabaseService } from '../../src/services/storage/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEMP DIRECTORIES AND DATABASES
// ═══════════════════════════════════════════════════════════════════════════════

export function createTestDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `casefile-test-${prefix}`));
}

export function cleanupTestDir(dir: string): void {
  try {
    if (existsSync(dir)) {
      rmSync(dir, { recursive: true, force: true });
    }
  } catch {
    // Ignore cleanup errors in tests
  }
}

export function createUniqueName(prefix: string): string {
  return `${prefix}-${uuidv4().slice(0, 8)}`;
}

export function createTestDatabase(dir: string): DatabaseService {
  return DatabaseService.create(createUniqueName('db'), dir);
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG AND DOCUMENTS
// ═══════════════════════════════════════════════════════════════════════════════

export const TEST_MODELS = {
  extraction: 'test-extract',
  verification: 'test-verify',
  decision: 'test-decide',
} as const;

export function createTestConfig(overrides: Parameters<typeof createPipelineConfig>[0] = {}): PipelineConfig {
  return createPipelineConfig({ models: TEST_MODELS, batchDelayMs: 0, ...overrides });
}

export function makeDocument(overrides: Partial<NormalizedDocument> = {}): NormalizedDocument {
  return {
    url: 'https://records.example.test/manifest-001.pdf',
    content_type: 'pdf',
    raw_text: 'PASSENGER MANIFEST\nJ. SMITH\nR. HALE',
    ocr_quality: 'clean',
    has_encoding_artifacts: false,
    page_count: 1,
    file_size_kb: 12,
    fetched_at: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════════

export function readFixture(relativePath: string): string {
  return readFileSync(new URL(`../fixtures/${relativePath}`, import.meta.url), 'utf-8');
}

export const manifestText = {
  extraction: (): string => readFixture('flight-manifest/extraction.json'),
  verification: (): string => readFixture('flight-manifest/verification.json'),
  decision: (): string => readFixture('flight-manifest/decision.json'),
};

export function manifestExtraction(): ExtractionResult {
  return ExtractionResultSchema.parse(JSON.parse(manifestText.extraction()));
}

export function manifestVerification(): VerificationResult {
  return VerificationResultSchema.parse(JSON.parse(manifestText.verification()));
}

export function manifestDecision(): DecisionResult {
  return DecisionResultSchema.parse(JSON.parse(manifestText.decision()));
}

// ═══════════════════════════════════════════════════════════════════════════════
// IN-PROCESS COLLABORATORS
// ═══════════════════════════════════════════════════════════════════════════════

type OracleReply = string | Error;

/**
 * Oracle that answers from a per-model table. Every request is recorded.
 */
export class FakeOracle implements Oracle {
  readonly requests: InferenceRequest[] = [];

  constructor(
    private readonly replies: Partial<Record<string, OracleReply>>,
    private readonly tokensPerCall = 15
  ) {}

  async infer(request: InferenceRequest): Promise<InferenceResponse> {
    this.requests.push(request);
    const reply = this.replies[request.model];
    if (reply === undefined) {
      throw new Error(`FakeOracle has no reply for model ${request.model}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return {
      text: reply,
      model: request.model,
      usage: { inputTokens: this.tokensPerCall - 5, outputTokens: 5, totalTokens: this.tokensPerCall },
      processingTimeMs: 1,
    };
  }
}

/** FakeOracle answering every stage with the flight-manifest fixtures */
export function manifestOracle(): FakeOracle {
  return new FakeOracle({
    [TEST_MODELS.extraction]: manifestText.extraction(),
    [TEST_MODELS.verification]: manifestText.verification(),
    [TEST_MODELS.decision]: manifestText.decision(),
  });
}

/**
 * Document source backed by a map. URLs mapped to an Error reject with it;
 * unmapped URLs get a default manifest document.
 */
export class FakeSource implements DocumentSource {
  readonly fetched: string[] = [];

  constructor(private readonly failures: ReadonlyMap<string, Error> = new Map()) {}

  async fetch(url: string): Promise<NormalizedDocument> {
    this.fetched.push(url);
    const failure = this.failures.get(url);
    if (failure) {
      throw failure;
    }
    return makeDocument({ url });
  }
}
