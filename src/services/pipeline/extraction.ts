/**
 * Extraction stage: first-pass entity extraction from document text.
 *
 * @module services/pipeline/extraction
 */

import {
  EXTRACTION_SIGNATURE_KEYS,
  type ExtractionResult,
  ExtractionResultSchema,
  type NormalizedDocument,
} from '../../models/index.js';
import type { Oracle } from '../inference/index.js';
import type { PipelineConfig } from './config.js';
import { buildExtractionContext, EXTRACTION_POLICY } from './prompts.js';
import { callStage, type StageOutcome } from './stage.js';

export interface ExtractionOutcome extends StageOutcome<ExtractionResult> {
  /** True when the text exceeded the processing window and was cut */
  truncated: boolean;
  coverageNote: string | null;
}

export function truncationNote(kept: number, total: number): string {
  return `Document truncated to ${kept} of ${total} characters; entities beyond the processing window were not extracted.`;
}

export function extractionFallback(raw: string): ExtractionResult {
  return {
    document_type: 'other',
    document_date: null,
    date_precision: 'unknown',
    persons_found: [],
    locations_found: [],
    events_found: [],
    organizations_found: [],
    victim_flags: [],
    scout_notes: `Unparseable oracle output. Raw: ${raw.slice(0, 200)}`,
    requires_human_review: true,
  };
}

export async function runExtraction(
  oracle: Oracle,
  document: NormalizedDocument,
  config: PipelineConfig
): Promise<ExtractionOutcome> {
  const total = document.raw_text.length;
  const truncated = total > config.maxProcessingChars;
  const text = truncated ? document.raw_text.slice(0, config.maxProcessingChars) : document.raw_text;
  const coverageNote = truncated ? truncationNote(text.length, total) : null;

  if (coverageNote) {
    console.error(`[Extraction] ${coverageNote}`);
  }

  const call = await callStage({
    label: 'Extraction',
    oracle,
    model: config.models.extraction,
    systemPolicy: EXTRACTION_POLICY,
    context: buildExtractionContext(document, text, coverageNote),
    maxOutputTokens: config.maxOutputTokens,
    schema: ExtractionResultSchema,
    signatureKeys: EXTRACTION_SIGNATURE_KEYS,
  });

  const result = call.value ?? extractionFallback(call.raw);

  console.error(
    `[Extraction] ${result.persons_found.length} persons, ${result.locations_found.length} locations, ` +
      `${result.events_found.length} events (${result.document_type}) in ${call.processingMs}ms, ${call.tokensUsed} tokens`
  );

  return {
    result,
    model: call.model,
    tokensUsed: call.tokensUsed,
    processingMs: call.processingMs,
    parsed: call.value !== null,
    truncated,
    coverageNote,
  };
}
