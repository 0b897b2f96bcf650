/**
 * Decision stage output: power index, relationships, pattern flags and the
 * evidence chain narrative.
 */

import { z } from 'zod';

import { CONFIDENCE_LEVELS } from './confidence.js';
import { boundedInt, lenientArray, oneOf, optionalText, text, textList } from './lenient.js';

export const INTELLIGENCE_VALUES = ['high', 'medium', 'low'] as const;

export type IntelligenceValue = (typeof INTELLIGENCE_VALUES)[number];

export const PERSON_CATEGORIES = [
  'finance',
  'politics',
  'royalty',
  'entertainment',
  'academia',
  'technology',
  'legal',
  'media',
  'other',
] as const;

export type PersonCategory = (typeof PERSON_CATEGORIES)[number];

export const RELATIONSHIP_TYPES = [
  'co_traveler',
  'financial',
  'social',
  'professional',
  'unknown',
] as const;

export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

/**
 * strong = 3+ independent documents, moderate = 2 documents or one strong
 * primary source, weak = single mention
 */
export const EVIDENCE_STRENGTHS = ['weak', 'moderate', 'strong'] as const;

export type EvidenceStrength = (typeof EVIDENCE_STRENGTHS)[number];

export const PATTERN_FLAG_TYPES = [
  'communication_drop',
  'multi_location',
  'multi_doc_type',
  'financial_physical',
  'other',
] as const;

export const SIGNIFICANCE_LEVELS = ['high', 'medium', 'low'] as const;

export const PowerIndexSchema = z
  .object({
    public_profile: boundedInt(0, 100, 0),
    institutional: boundedInt(0, 100, 0),
    network_centrality: boundedInt(0, 100, 0),
    corroboration: boundedInt(0, 100, 0),
  })
  .nullable()
  .catch(null);

export const PersonIntelligenceSchema = z.object({
  name: text(),
  final_confidence: oneOf(CONFIDENCE_LEVELS, 'unverified'),
  power_index: PowerIndexSchema,
  category: oneOf(PERSON_CATEGORIES, 'other'),
  pattern_flags: textList(),
  upgrade_gap: optionalText(),
});

export const RelationshipDeterminationSchema = z.object({
  person_a: text(),
  person_b: text(),
  relationship_type: oneOf(RELATIONSHIP_TYPES, 'unknown'),
  evidence_strength: oneOf(EVIDENCE_STRENGTHS, 'weak'),
  notes: optionalText(),
});

export const PatternFlagSchema = z.object({
  flag_type: oneOf(PATTERN_FLAG_TYPES, 'other'),
  description: text(),
  persons_involved: textList(),
  significance: oneOf(SIGNIFICANCE_LEVELS, 'low'),
});

export const DecisionResultSchema = z.object({
  intelligence_value: oneOf(INTELLIGENCE_VALUES, 'low'),
  intelligence_summary: text(),
  persons_intelligence: lenientArray(PersonIntelligenceSchema),
  relationship_determinations: lenientArray(RelationshipDeterminationSchema),
  pattern_flags: lenientArray(PatternFlagSchema),
  flight_intelligence: optionalText(),
  decision_log: textList(),
  evidence_chain: text(),
  requires_human_review: z.boolean().catch(false),
});

export type PowerIndex = NonNullable<z.output<typeof PowerIndexSchema>>;
export type PersonIntelligence = z.output<typeof PersonIntelligenceSchema>;
export type RelationshipDetermination = z.output<typeof RelationshipDeterminationSchema>;
export type PatternFlag = z.output<typeof PatternFlagSchema>;
export type DecisionResult = z.output<typeof DecisionResultSchema>;

export const DECISION_SIGNATURE_KEYS = [
  'intelligence_value',
  'persons_intelligence',
  'relationship_determinations',
] as const;
