/**
 * Verification stage: assigns the confidence of record to every extracted
 * entity and reports conflicts with what is already stored.
 *
 * @module services/pipeline/verification
 */

import {
  type ExtractionResult,
  type NormalizedDocument,
  VERIFICATION_SIGNATURE_KEYS,
  type VerificationResult,
  VerificationResultSchema,
} from '../../models/index.js';
import type { Oracle } from '../inference/index.js';
import type { PipelineConfig } from './config.js';
import { buildVerificationContext, VERIFICATION_POLICY } from './prompts.js';
import { callStage, type StageOutcome } from './stage.js';

export function verificationFallback(): VerificationResult {
  return {
    verification_summary: '',
    document_confidence: 'unverified',
    ocr_reliability: 'unreliable',
    verified_persons: [],
    verified_locations: [],
    verified_events: [],
    flight_details: null,
    conflicts_detected: [],
    anomalies: ['Unparseable oracle output'],
    requires_human_review: true,
    human_review_reason: 'Verification oracle output unparseable',
  };
}

/** An upgrade gap only means something below the top tier */
function dropConfirmedGaps(result: VerificationResult): VerificationResult {
  return {
    ...result,
    verified_persons: result.verified_persons.map((p) =>
      p.confidence === 'confirmed' ? { ...p, upgrade_gap: null } : p
    ),
    verified_events: result.verified_events.map((e) =>
      e.confidence === 'confirmed' ? { ...e, upgrade_gap: null } : e
    ),
  };
}

export async function runVerification(
  oracle: Oracle,
  extraction: ExtractionResult,
  document: NormalizedDocument,
  contextSummary: string,
  config: PipelineConfig
): Promise<StageOutcome<VerificationResult>> {
  const call = await callStage({
    label: 'Verification',
    oracle,
    model: config.models.verification,
    systemPolicy: VERIFICATION_POLICY,
    context: buildVerificationContext(extraction, document, contextSummary),
    maxOutputTokens: config.maxOutputTokens,
    schema: VerificationResultSchema,
    signatureKeys: VERIFICATION_SIGNATURE_KEYS,
  });

  const result = call.value ? dropConfirmedGaps(call.value) : verificationFallback();

  console.error(
    `[Verification] document confidence ${result.document_confidence}, ` +
      `${result.verified_persons.length} persons, ${result.conflicts_detected.length} conflicts ` +
      `in ${call.processingMs}ms`
  );

  return {
    result,
    model: call.model,
    tokensUsed: call.tokensUsed,
    processingMs: call.processingMs,
    parsed: call.value !== null,
  };
}
