/**
 * Environment variable readers shared by the config loaders.
 *
 * @module utils/env
 */

import { ValidationError } from './validation.js';

/**
 * Read an integer env var. Unset or empty falls back; garbage throws.
 */
export function parseIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new ValidationError(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

/**
 * Read a comma-separated list env var, trimming entries and dropping blanks.
 */
export function parseListEnv(name: string): string[] | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
