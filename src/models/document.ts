/**
 * Document interfaces
 *
 * A document is identified by a reference derived from its source URL
 * (see deriveDocumentReference), never by its row id.
 */

export const DOCUMENT_TYPES = [
  'flight_manifest',
  'email',
  'financial_record',
  'fbi_report',
  'court_filing',
  'photograph',
  'contact_book_entry',
  'other',
] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export const DATE_PRECISIONS = ['exact', 'approximate', 'range', 'year_only', 'unknown'] as const;

export type DatePrecision = (typeof DATE_PRECISIONS)[number];

/** OCR quality tier, from the readable-character ratio of the extracted text */
export const OCR_QUALITIES = ['clean', 'minor_artifacts', 'degraded', 'poor'] as const;

export type OcrQuality = (typeof OCR_QUALITIES)[number];

export const REDACTION_STATUSES = ['none', 'partial'] as const;

export type RedactionStatus = (typeof REDACTION_STATUSES)[number];

/**
 * Output of the document normalizer: text plus the quality signals the
 * stages reason about.
 */
export interface NormalizedDocument {
  url: string;
  content_type: string;
  raw_text: string;
  ocr_quality: OcrQuality;
  has_encoding_artifacts: boolean;
  page_count: number;
  file_size_kb: number;
  /** ISO 8601 */
  fetched_at: string;
}

/**
 * Persisted document row
 */
export interface DocumentRecord {
  /** UUID v4 */
  id: string;
  /** 'DOC-' + 16 upper-case hex chars, unique */
  doc_reference_id: string;
  source_url: string;
  source: string;
  document_type: DocumentType;
  document_date: string | null;
  date_precision: DatePrecision;
  ocr_quality: OcrQuality;
  has_encoding_artifacts: boolean;
  page_count: number;
  file_size_kb: number;
  content_type: string;
  redaction_status: RedactionStatus;
  batch_id: string;
  is_processed: boolean;
  processed_at: string | null;
  notes: string | null;
  requires_human_review: boolean;
  created_at: string;
  updated_at: string;
}

/** Fields the writer supplies when upserting a document */
export type DocumentUpsert = Omit<DocumentRecord, 'id' | 'created_at' | 'updated_at'>;
