/**
 * Inference Configuration
 *
 * Settings for the local Ollama server that backs the three pipeline oracles.
 * No API key required - Ollama runs locally.
 *
 * Model routing per stage lives in the pipeline config, not here: this file
 * only describes how to talk to the server.
 */

import { z } from 'zod';

import { parseIntEnv } from '../../utils/env.js';
import { validateInput } from '../../utils/validation.js';

export const InferenceConfigSchema = z.object({
  baseUrl: z.string().url().default('http://localhost:11434'),

  // Generation defaults
  maxOutputTokens: z.number().int().positive().default(4096),
  temperature: z.number().min(0).max(2).default(0),

  /** Per-request timeout. Large documents on local hardware can take minutes. */
  timeoutMs: z.number().int().positive().default(300_000),

  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(3),
      baseDelayMs: z.number().int().min(0).default(1000),
      maxDelayMs: z.number().int().min(0).default(30_000),
    })
    .default({}),

  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().min(1).default(5),
      recoveryTimeMs: z.number().int().min(0).default(60_000),
    })
    .default({}),
});

export type InferenceConfig = z.infer<typeof InferenceConfigSchema>;
export type InferenceConfigInput = z.input<typeof InferenceConfigSchema>;

/**
 * Build a config from defaults and overrides only; no environment lookups.
 *
 * @throws ValidationError on malformed values
 */
export function createInferenceConfig(overrides: InferenceConfigInput = {}): InferenceConfig {
  return Object.freeze(validateInput(InferenceConfigSchema, overrides));
}

/**
 * Load inference configuration from environment variables.
 *
 * Environment variables:
 *   CASEFILE_OLLAMA_URL            - Ollama server URL (default: http://localhost:11434)
 *   CASEFILE_INFERENCE_TIMEOUT_MS  - Per-request timeout (default: 300000)
 *   CASEFILE_MAX_OUTPUT_TOKENS     - num_predict sent to Ollama (default: 4096)
 */
export function loadInferenceConfig(overrides: InferenceConfigInput = {}): InferenceConfig {
  const envConfig = {
    baseUrl: process.env.CASEFILE_OLLAMA_URL || 'http://localhost:11434',
    timeoutMs: parseIntEnv('CASEFILE_INFERENCE_TIMEOUT_MS', 300_000),
    maxOutputTokens: parseIntEnv('CASEFILE_MAX_OUTPUT_TOKENS', 4096),
  };

  return createInferenceConfig({ ...envConfig, ...overrides });
}
