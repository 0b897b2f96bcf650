/**
 * Text quality signals for fetched documents.
 *
 * @module services/documents/quality
 */

import type { OcrQuality } from '../../models/index.js';

const READABLE_CHAR = /[A-Za-z0-9\s.,;:'"!?-]/g;

/** More '=' than this on one page marks a mangled text layer */
export const ENCODING_ARTIFACT_THRESHOLD = 20;

/** Share of characters that are letters, digits, whitespace or plain punctuation */
export function readableRatio(text: string): number {
  if (text.length === 0) return 0;
  const readable = text.match(READABLE_CHAR)?.length ?? 0;
  return readable / text.length;
}

export function assessOcrQuality(text: string): OcrQuality {
  const ratio = readableRatio(text);
  if (ratio > 0.85) return 'clean';
  if (ratio > 0.7) return 'minor_artifacts';
  if (ratio > 0.5) return 'degraded';
  return 'poor';
}

export function hasEncodingArtifacts(pages: readonly string[]): boolean {
  return pages.some((page) => countChar(page, '=') > ENCODING_ARTIFACT_THRESHOLD);
}

function countChar(text: string, char: string): number {
  let count = 0;
  for (const c of text) {
    if (c === char) count++;
  }
  return count;
}
