/**
 * Zod Validation Schemas
 *
 * Input validation for the MCP tools, the CLI and the batch orchestrator.
 *
 * @module utils/validation
 */

import { z } from 'zod';

import { CONFLICT_KINDS } from '../models/entities.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @returns Validated data, with schema defaults and transforms applied
 * @throws ValidationError listing every failing path
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DocumentUrl = z
  .string()
  .trim()
  .url('Document reference must be an absolute URL')
  .refine((u) => /^https?:\/\//i.test(u), 'Only http and https document URLs are supported');

export const BatchLabel = z
  .string()
  .trim()
  .min(1, 'Batch label is required')
  .max(100, 'Batch label must be 100 characters or less');

/**
 * Ordered, non-empty list of document references for a batch
 */
export const DocumentUrlList = z
  .array(DocumentUrl)
  .min(1, 'At least one document URL is required')
  .max(1000, 'A batch may hold at most 1000 documents');

// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE TOOL SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ProcessDocumentInput = z.object({
  url: DocumentUrl,
  batch_label: BatchLabel.default('manual'),
});

export const ProcessBatchInput = z.object({
  urls: DocumentUrlList,
  batch_label: BatchLabel,
  delay_seconds: z.number().min(0).max(600).optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// RECORD TOOL SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ReviewQueueInput = z.object({
  kind: z.enum(CONFLICT_KINDS).optional(),
  limit: z.number().int().min(1).max(500).default(50),
});

export const PersonGetInput = z.object({
  name: z.string().trim().min(2, 'Name must be at least 2 characters').max(200),
});

export const StatsInput = z.object({});
