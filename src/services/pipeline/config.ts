/**
 * Pipeline Configuration
 *
 * One immutable value, resolved once at the entry point and passed to the
 * orchestrator, stages and writer. Nothing downstream reads process.env.
 *
 * @module services/pipeline/config
 */

import { z } from 'zod';

import { parseIntEnv, parseListEnv } from '../../utils/env.js';
import { validateInput } from '../../utils/validation.js';

/**
 * Names containing any of these (case-insensitive) are treated as possible
 * victims and never written as persons. Configured terms extend this list;
 * they cannot shrink it.
 */
export const DEFAULT_PROTECTED_TERMS = [
  'victim',
  'survivor',
  'minor',
  'underage',
  'trafficking victim',
  'jane doe',
  'john doe',
  'alleged victim',
  'complainant',
] as const;

export const PipelineConfigSchema = z.object({
  models: z
    .object({
      extraction: z.string().min(1).default('llama3.1:8b'),
      verification: z.string().min(1).default('llama3.1:70b'),
      decision: z.string().min(1).default('llama3.1:70b'),
    })
    .default({}),

  /** Characters of document text sent to the oracle; the rest is cut */
  maxProcessingChars: z.number().int().positive().default(80_000),
  maxOutputTokens: z.number().int().positive().default(4096),

  contextPersonLimit: z.number().int().positive().default(20),
  contextLocationLimit: z.number().int().positive().default(10),

  /** Pause between documents in a batch */
  batchDelayMs: z.number().int().min(0).default(2000),

  protectedTerms: z
    .array(z.string())
    .default([])
    .transform((terms) => {
      const merged = new Set<string>(DEFAULT_PROTECTED_TERMS);
      for (const term of terms) {
        const normalized = term.trim().toLowerCase();
        if (normalized.length > 0) merged.add(normalized);
      }
      return [...merged];
    }),

  /** Value stored in documents.source */
  documentSource: z.string().min(1).default('doj_release'),

  fetchTimeoutMs: z.number().int().positive().default(300_000),

  storagePath: z.string().min(1).optional(),
  databaseName: z
    .string()
    .regex(/^[a-zA-Z0-9_-]+$/, 'Database name may only contain letters, digits, _ and -')
    .default('casefile'),

  telemetry: z
    .object({
      /** Unset disables telemetry */
      endpoint: z.string().url().optional(),
      domain: z.string().min(1).default('casefile-radar'),
    })
    .default({}),
});

export type PipelineConfig = z.output<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

function freezeConfig(config: PipelineConfig): PipelineConfig {
  Object.freeze(config.models);
  Object.freeze(config.protectedTerms);
  Object.freeze(config.telemetry);
  return Object.freeze(config);
}

/**
 * Build a config from defaults only; no environment lookups. Tests and
 * embedders use this.
 */
export function createPipelineConfig(overrides: PipelineConfigInput = {}): PipelineConfig {
  return freezeConfig(validateInput(PipelineConfigSchema, overrides));
}

/**
 * Load pipeline configuration from environment variables, with code
 * overrides taking precedence.
 *
 * Environment variables:
 *   CASEFILE_EXTRACTION_MODEL    - extraction model (default: llama3.1:8b)
 *   CASEFILE_VERIFICATION_MODEL  - verification model (default: llama3.1:70b)
 *   CASEFILE_DECISION_MODEL      - decision model (default: llama3.1:70b)
 *   CASEFILE_BATCH_DELAY_MS      - pause between batch documents (default: 2000)
 *   CASEFILE_MAX_CHARS           - processing window (default: 80000)
 *   CASEFILE_PROTECTED_TERMS     - extra comma-separated lexicon terms
 *   CASEFILE_STORAGE_PATH        - database directory
 *   CASEFILE_DATABASE            - database name (default: casefile)
 *   CASEFILE_TELEMETRY_URL       - telemetry endpoint (unset: disabled)
 *   CASEFILE_TELEMETRY_DOMAIN    - telemetry site domain
 *
 * @throws ValidationError on malformed values
 */
export function loadPipelineConfig(overrides: PipelineConfigInput = {}): PipelineConfig {
  const env = process.env;
  const envModels = {
    ...(env.CASEFILE_EXTRACTION_MODEL ? { extraction: env.CASEFILE_EXTRACTION_MODEL } : {}),
    ...(env.CASEFILE_VERIFICATION_MODEL ? { verification: env.CASEFILE_VERIFICATION_MODEL } : {}),
    ...(env.CASEFILE_DECISION_MODEL ? { decision: env.CASEFILE_DECISION_MODEL } : {}),
  };
  const envTelemetry = {
    ...(env.CASEFILE_TELEMETRY_URL ? { endpoint: env.CASEFILE_TELEMETRY_URL } : {}),
    ...(env.CASEFILE_TELEMETRY_DOMAIN ? { domain: env.CASEFILE_TELEMETRY_DOMAIN } : {}),
  };

  const merged: PipelineConfigInput = {
    batchDelayMs: parseIntEnv('CASEFILE_BATCH_DELAY_MS', 2000),
    maxProcessingChars: parseIntEnv('CASEFILE_MAX_CHARS', 80_000),
    protectedTerms: parseListEnv('CASEFILE_PROTECTED_TERMS'),
    storagePath: env.CASEFILE_STORAGE_PATH || undefined,
    databaseName: env.CASEFILE_DATABASE || undefined,
    ...overrides,
    models: { ...envModels, ...overrides.models },
    telemetry: { ...envTelemetry, ...overrides.telemetry },
  };

  return createPipelineConfig(merged);
}
