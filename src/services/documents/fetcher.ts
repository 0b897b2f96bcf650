/**
 * HTTP document source
 *
 * GETs a document, picks PDF or HTML extraction by content type, URL
 * extension or the %PDF signature, and scores the extracted text.
 * Transient failures (5xx, 429, socket errors) are retried with backoff.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/documents/fetcher
 */

import type { NormalizedDocument } from '../../models/index.js';
import { isTransientError, withRetry } from '../../utils/backoff.js';
import { extractHtmlText } from './html.js';
import { extractPdfText, looksLikePdf, type PdfText } from './pdf.js';
import { assessOcrQuality, hasEncodingArtifacts } from './quality.js';
import { DocumentFetchError, type DocumentSource } from './types.js';

const USER_AGENT = 'casefile-radar/1.0 (document research)';
const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

export interface HttpDocumentSourceOptions {
  timeoutMs: number;
  maxAttempts?: number;
  baseDelayMs?: number;
}

function isPdfResponse(url: string, contentType: string, bytes: Uint8Array): boolean {
  if (contentType.includes('application/pdf')) return true;
  const path = url.toLowerCase().split('?')[0] ?? '';
  return path.endsWith('.pdf') || looksLikePdf(bytes);
}

function shouldRetryFetch(error: unknown): boolean {
  if (error instanceof DocumentFetchError) {
    return error.status !== null ? RETRYABLE_STATUSES.has(error.status) : isTransientError(error);
  }
  return isTransientError(error);
}

export class HttpDocumentSource implements DocumentSource {
  private readonly options: Required<HttpDocumentSourceOptions>;

  constructor(options: HttpDocumentSourceOptions) {
    this.options = { maxAttempts: 3, baseDelayMs: 1000, ...options };
  }

  async fetch(url: string): Promise<NormalizedDocument> {
    const { bytes, contentType } = await withRetry(() => this.download(url), shouldRetryFetch, {
      maxAttempts: this.options.maxAttempts,
      baseDelayMs: this.options.baseDelayMs,
      label: 'DocumentFetch',
    });
    const fileSizeKb = Math.floor(bytes.byteLength / 1024);
    const fetchedAt = new Date().toISOString();

    if (isPdfResponse(url, contentType, bytes)) {
      let pdf: PdfText;
      try {
        pdf = await extractPdfText(Buffer.from(bytes));
      } catch (error) {
        throw new DocumentFetchError(
          `Failed to parse PDF: ${error instanceof Error ? error.message : String(error)}`,
          url,
          null,
          { cause: error }
        );
      }
      console.error(`[DocumentFetch] PDF: ${pdf.pageCount} pages, ${pdf.text.length} chars`);
      return {
        url,
        content_type: 'pdf',
        raw_text: pdf.text,
        ocr_quality: assessOcrQuality(pdf.text),
        has_encoding_artifacts: hasEncodingArtifacts(pdf.pages),
        page_count: pdf.pageCount,
        file_size_kb: fileSizeKb,
        fetched_at: fetchedAt,
      };
    }

    const text = extractHtmlText(Buffer.from(bytes).toString('utf-8'));
    console.error(`[DocumentFetch] HTML: ${text.length} chars`);
    return {
      url,
      content_type: 'html',
      raw_text: text,
      ocr_quality: 'clean',
      has_encoding_artifacts: false,
      page_count: 1,
      file_size_kb: fileSizeKb,
      fetched_at: fetchedAt,
    };
  }

  private async download(url: string): Promise<{ bytes: Uint8Array; contentType: string }> {
    let response: Response;
    try {
      response = await fetch(url, {
        redirect: 'follow',
        headers: {
          'User-Agent': USER_AGENT,
          Accept: 'application/pdf,text/html,application/xhtml+xml,*/*',
        },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new DocumentFetchError(
        `Document transport failure: ${error instanceof Error ? error.message : String(error)}`,
        url,
        null,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new DocumentFetchError(
        `Document fetch failed: HTTP ${response.status} ${response.statusText}`,
        url,
        response.status
      );
    }

    return {
      bytes: new Uint8Array(await response.arrayBuffer()),
      contentType: response.headers.get('content-type') ?? '',
    };
  }
}
