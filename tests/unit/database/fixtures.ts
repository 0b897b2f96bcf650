/**
 * Row builders for the database tests
 *
 * @module tests/unit/database/fixtures
 */

import type { DocumentUpsert, PersonUpsert } from '../../../src/models/index.js';
import { deriveDocumentReference } from '../../../src/utils/hash.js';
import { toNameKey } from '../../../src/utils/names.js';

export function documentUpsert(
  url: string,
  overrides: Partial<DocumentUpsert> = {}
): DocumentUpsert {
  return {
    doc_reference_id: deriveDocumentReference(url),
    source_url: url,
    source: 'records.example.test',
    document_type: 'flight_manifest',
    document_date: '2002-03-14',
    date_precision: 'exact',
    ocr_quality: 'clean',
    has_encoding_artifacts: false,
    page_count: 1,
    file_size_kb: 12,
    content_type: 'pdf',
    redaction_status: 'none',
    batch_id: 'test-batch',
    is_processed: true,
    processed_at: '2024-01-01T00:00:00.000Z',
    notes: null,
    requires_human_review: false,
    ...overrides,
  };
}

export function personUpsert(fullName: string, overrides: Partial<PersonUpsert> = {}): PersonUpsert {
  return {
    name_key: toNameKey(fullName),
    full_name: fullName,
    confidence: 'indicated',
    redaction_status: 'none',
    name_recovered: false,
    power_public_profile: null,
    power_institutional: null,
    power_network_centrality: null,
    category: null,
    upgrade_gap_note: null,
    flagged_for_review: false,
    ...overrides,
  };
}
