/**
 * Decision stage: power index, relationships, pattern flags and the
 * evidence chain.
 *
 * The oracle does not get the last word on confidence. Each person's
 * final_confidence is taken from the matching verification entry, and the
 * corroboration sub-score is always recomputed from it.
 *
 * @module services/pipeline/decision
 */

import {
  corroborationScore,
  DECISION_SIGNATURE_KEYS,
  type DecisionResult,
  DecisionResultSchema,
  type ExtractionResult,
  type NormalizedDocument,
  type PersonIntelligence,
  type VerificationResult,
} from '../../models/index.js';
import { toNameKey } from '../../utils/names.js';
import type { Oracle } from '../inference/index.js';
import type { PipelineConfig } from './config.js';
import { buildDecisionContext, DECISION_POLICY } from './prompts.js';
import { callStage, type StageOutcome } from './stage.js';

export function decisionFallback(): DecisionResult {
  return {
    intelligence_value: 'low',
    intelligence_summary: '',
    persons_intelligence: [],
    relationship_determinations: [],
    pattern_flags: [],
    flight_intelligence: null,
    decision_log: ['Unparseable oracle output'],
    evidence_chain: 'Unable to generate evidence chain. Human review required.',
    requires_human_review: true,
  };
}

/**
 * Accept `category_inference` as an alias for `category`; some models keep
 * the older key name.
 */
function aliasCategory(value: Record<string, unknown>): Record<string, unknown> {
  const persons = value.persons_intelligence;
  if (!Array.isArray(persons)) return value;
  return {
    ...value,
    persons_intelligence: persons.map((person: unknown) => {
      if (typeof person !== 'object' || person === null || Array.isArray(person)) return person;
      if ('category' in person) return person;
      if (!('category_inference' in person)) return person;
      return { ...person, category: person.category_inference };
    }),
  };
}

/**
 * Pin final_confidence to verification and project corroboration from it.
 */
export function reconcilePersons(
  persons: PersonIntelligence[],
  verification: VerificationResult
): PersonIntelligence[] {
  const verified = new Map(verification.verified_persons.map((p) => [toNameKey(p.name), p.confidence]));
  return persons.map((person) => {
    const finalConfidence = verified.get(toNameKey(person.name)) ?? person.final_confidence;
    return {
      ...person,
      final_confidence: finalConfidence,
      power_index: person.power_index
        ? { ...person.power_index, corroboration: corroborationScore(finalConfidence) }
        : null,
    };
  });
}

export async function runDecision(
  oracle: Oracle,
  verification: VerificationResult,
  extraction: ExtractionResult,
  document: NormalizedDocument,
  config: PipelineConfig
): Promise<StageOutcome<DecisionResult>> {
  const call = await callStage({
    label: 'Decision',
    oracle,
    model: config.models.decision,
    systemPolicy: DECISION_POLICY,
    context: buildDecisionContext(verification, extraction, document),
    maxOutputTokens: config.maxOutputTokens,
    schema: DecisionResultSchema,
    signatureKeys: DECISION_SIGNATURE_KEYS,
    prepare: aliasCategory,
  });

  const result = call.value
    ? { ...call.value, persons_intelligence: reconcilePersons(call.value.persons_intelligence, verification) }
    : decisionFallback();

  console.error(
    `[Decision] intelligence value ${result.intelligence_value}, ` +
      `${result.relationship_determinations.length} relationships, ${result.pattern_flags.length} pattern flags ` +
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
