/**
 * Confidence lattice
 *
 * Ordered evidentiary tiers assigned during verification:
 *   unverified < indicated < corroborated < confirmed
 *
 * Verification confidence is the system of record. The power-index
 * corroboration sub-score is a fixed projection of it and is never taken
 * from the oracle.
 */

export const CONFIDENCE_LEVELS = ['unverified', 'indicated', 'corroborated', 'confirmed'] as const;

export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

/** Corroboration sub-score per confidence level */
export const CORROBORATION_SCORES: Readonly<Record<ConfidenceLevel, number>> = Object.freeze({
  confirmed: 90,
  corroborated: 70,
  indicated: 40,
  unverified: 15,
});

/** Position in the lattice, 0 for unverified through 3 for confirmed */
export function confidenceRank(level: ConfidenceLevel): number {
  return CONFIDENCE_LEVELS.indexOf(level);
}

export function corroborationScore(level: ConfidenceLevel): number {
  return CORROBORATION_SCORES[level];
}
