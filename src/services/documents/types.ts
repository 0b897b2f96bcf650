/**
 * Document source contract and errors
 *
 * @module services/documents/types
 */

import type { NormalizedDocument } from '../../models/index.js';

/**
 * Turns a document URL into text plus quality signals. The orchestrator
 * depends only on this; HttpDocumentSource is the network implementation.
 */
export interface DocumentSource {
  fetch(url: string): Promise<NormalizedDocument>;
}

export class DocumentFetchError extends Error {
  readonly url: string;
  /** HTTP status when the server answered, null for transport or parse failures */
  readonly status: number | null;

  constructor(message: string, url: string, status: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DocumentFetchError';
    this.url = url;
    this.status = status;
  }
}
