/**
 * Document normalizer: fetch, text extraction and quality scoring.
 */

export { HttpDocumentSource, type HttpDocumentSourceOptions } from './fetcher.js';
export { DocumentFetchError, type DocumentSource } from './types.js';
export { assessOcrQuality, hasEncodingArtifacts, readableRatio } from './quality.js';
export { extractHtmlText } from './html.js';
