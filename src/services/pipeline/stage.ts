/**
 * Shared oracle-call plumbing for the three pipeline stages.
 *
 * @module services/pipeline/stage
 */

import type { z } from 'zod';

import type { Oracle } from '../inference/index.js';
import { hasSignatureKeys, parseOracleJson } from './json.js';

export interface StageOutcome<T> {
  result: T;
  model: string;
  tokensUsed: number;
  processingMs: number;
  /** False when the oracle output was unusable and the fallback was applied */
  parsed: boolean;
}

export interface StageCall<S extends z.ZodTypeAny> {
  label: string;
  oracle: Oracle;
  model: string;
  systemPolicy: string;
  context: string;
  maxOutputTokens: number;
  schema: S;
  signatureKeys: readonly string[];
  /** Rewrites the raw object before schema validation (key aliases etc.) */
  prepare?: (value: Record<string, unknown>) => Record<string, unknown>;
}

export interface StageCallResult<T> {
  /** Null when the output could not be parsed into the stage's shape */
  value: T | null;
  raw: string;
  model: string;
  tokensUsed: number;
  processingMs: number;
}

/**
 * Invoke the oracle and coerce its output. Oracle transport errors
 * propagate; malformed output comes back as `value: null`.
 */
export async function callStage<S extends z.ZodTypeAny>(
  call: StageCall<S>
): Promise<StageCallResult<z.output<S>>> {
  const startTime = Date.now();
  const response = await call.oracle.infer({
    systemPolicy: call.systemPolicy,
    context: call.context,
    model: call.model,
    maxOutputTokens: call.maxOutputTokens,
  });
  const processingMs = Date.now() - startTime;

  const base = {
    raw: response.text,
    model: response.model || call.model,
    tokensUsed: response.usage.totalTokens,
    processingMs,
  };

  const json = parseOracleJson(response.text);
  if (!json.ok || !hasSignatureKeys(json.value, call.signatureKeys)) {
    console.error(`[${call.label}] Oracle output unparseable, applying fallback`);
    return { ...base, value: null };
  }

  const prepared = call.prepare ? call.prepare(json.value) : json.value;
  const validated = call.schema.safeParse(prepared);
  if (!validated.success) {
    console.error(`[${call.label}] Oracle output failed validation: ${validated.error.message}`);
    return { ...base, value: null };
  }

  return { ...base, value: validated.data };
}
