/**
 * Batch Orchestrator
 *
 * Runs each document through Normalize → Extract → Context → Verify →
 * Decide → Write, one document at a time. A document's failure is caught
 * into its result entry and the batch moves on.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/pipeline/orchestrator
 */

import { v4 as uuidv4 } from 'uuid';

import type { DocumentType, IntelligenceValue } from '../../models/index.js';
import { sleep as defaultSleep } from '../../utils/backoff.js';
import { BatchLabel, DocumentUrlList, validateInput } from '../../utils/validation.js';
import type { DocumentSource } from '../documents/types.js';
import type { Oracle } from '../inference/index.js';
import type { RecordStore } from '../storage/types.js';
import type { PipelineConfig } from './config.js';
import { assembleContext } from './context.js';
import { runDecision } from './decision.js';
import { runExtraction } from './extraction.js';
import type { TelemetrySink } from './telemetry.js';
import { runVerification } from './verification.js';
import { collectFlaggedVictimKeys } from './victim-protection.js';
import { type WriteSummary, writeRecords } from './writer.js';

export interface DocumentRunSuccess {
  url: string;
  status: 'success';
  documentType: DocumentType;
  intelligenceValue: IntelligenceValue;
  requiresHumanReview: boolean;
  truncated: boolean;
  processingMs: number;
  write: WriteSummary;
}

export interface DocumentRunFailure {
  url: string;
  status: 'error';
  error: string;
}

export type DocumentRunResult = DocumentRunSuccess | DocumentRunFailure;

export interface BatchResult {
  batchId: string;
  batchLabel: string;
  total: number;
  successful: number;
  failed: number;
  /** "<successful>/<total>" */
  summary: string;
  results: DocumentRunResult[];
}

export interface BatchOptions {
  /** Pause between documents; defaults to config.batchDelayMs */
  delayMs?: number;
}

export interface OrchestratorDeps {
  source: DocumentSource;
  oracle: Oracle;
  store: RecordStore;
  config: PipelineConfig;
  telemetry?: TelemetrySink;
  sleep?: (ms: number) => Promise<void>;
}

/** Unique id for one run of a batch label */
export function createBatchId(batchLabel: string): string {
  return `${batchLabel}-${uuidv4()}`;
}

export class PipelineOrchestrator {
  private readonly source: DocumentSource;
  private readonly oracle: Oracle;
  private readonly store: RecordStore;
  private readonly config: PipelineConfig;
  private readonly telemetry: TelemetrySink | undefined;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(deps: OrchestratorDeps) {
    this.source = deps.source;
    this.oracle = deps.oracle;
    this.store = deps.store;
    this.config = deps.config;
    this.telemetry = deps.telemetry;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Full pipeline for one document. Fetch, oracle transport and store
   * errors propagate; malformed oracle output does not.
   */
  async processDocument(url: string, batchId: string): Promise<DocumentRunSuccess> {
    const startedAt = new Date().toISOString();
    const startTime = Date.now();

    const document = await this.source.fetch(url);

    const extraction = await runExtraction(this.oracle, document, this.config);

    const contextSummary = assembleContext(
      this.store,
      extraction.result.persons_found.map((p) => p.name),
      extraction.result.locations_found.map((l) => l.name),
      this.config,
      collectFlaggedVictimKeys(extraction.result)
    );

    const verification = await runVerification(
      this.oracle,
      extraction.result,
      document,
      contextSummary,
      this.config
    );

    const decision = await runDecision(
      this.oracle,
      verification.result,
      extraction.result,
      document,
      this.config
    );

    const write = writeRecords(
      this.store,
      {
        document,
        batchId,
        extraction: extraction.result,
        verification: verification.result,
        decision: decision.result,
        models: {
          extraction: extraction.model,
          verification: verification.model,
          decision: decision.model,
        },
        tokensUsed: extraction.tokensUsed + verification.tokensUsed + decision.tokensUsed,
        processingMs: Date.now() - startTime,
        startedAt,
      },
      this.config
    );

    return {
      url,
      status: 'success',
      documentType: extraction.result.document_type,
      intelligenceValue: decision.result.intelligence_value,
      requiresHumanReview:
        extraction.result.requires_human_review ||
        verification.result.requires_human_review ||
        decision.result.requires_human_review,
      truncated: extraction.truncated,
      processingMs: Date.now() - startTime,
      write,
    };
  }

  /**
   * Process `urls` strictly in order. Input is validated before any
   * document starts; after that, nothing short of a bug stops the batch.
   *
   * @throws ValidationError for an empty list, a blank URL or a bad label
   */
  async processBatch(
    urls: string[],
    batchLabel: string,
    options: BatchOptions = {}
  ): Promise<BatchResult> {
    const validUrls = validateInput(DocumentUrlList, urls);
    const label = validateInput(BatchLabel, batchLabel);
    const delayMs = options.delayMs ?? this.config.batchDelayMs;
    const batchId = createBatchId(label);

    console.error(`[Batch] ${batchId}: ${validUrls.length} documents, ${delayMs}ms delay`);

    const results: DocumentRunResult[] = [];
    for (const [index, url] of validUrls.entries()) {
      console.error(`[Batch] Document ${index + 1}/${validUrls.length}`);
      try {
        const result = await this.processDocument(url, batchId);
        results.push(result);
        this.track('document_processed', {
          batch_label: label,
          status: 'success',
          document_type: result.documentType,
          persons: result.write.personsWritten,
          locations: result.write.locationsWritten,
          events: result.write.eventsCreated,
          relationships: result.write.relationshipsWritten,
          conflicts: result.write.conflictsLogged,
          victim_flags: result.write.victimFlags,
          tokens: result.write.tokensUsed,
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Batch] Document ${index + 1}/${validUrls.length} failed: ${message}`);
        results.push({ url, status: 'error', error: message });
        this.track('document_failed', {
          batch_label: label,
          status: 'error',
          error_type: error instanceof Error ? error.name : 'unknown',
        });
      }

      if (index < validUrls.length - 1 && delayMs > 0) {
        await this.sleep(delayMs);
      }
    }

    const successful = results.filter((r) => r.status === 'success').length;
    const summary = `${successful}/${validUrls.length}`;
    console.error(`[Batch] ${batchId} complete: ${summary} succeeded`);

    return {
      batchId,
      batchLabel: label,
      total: validUrls.length,
      successful,
      failed: validUrls.length - successful,
      summary,
      results,
    };
  }

  private track(name: string, props: Record<string, string | number | boolean>): void {
    if (!this.telemetry) return;
    void this.telemetry.track(name, props);
  }
}
