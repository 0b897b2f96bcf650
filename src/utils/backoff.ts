/**
 * Exponential Backoff with Jitter
 *
 * Base delay doubles each attempt: 1s, 2s, 4s, 8s, 16s (capped at 30s).
 * Jitter adds +/-25% randomness so retries from a batch do not line up.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs: number;
  /** Maximum number of attempts, first call included (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25 = +/-25%) */
  jitterFraction: number;
  /** Tag used in the retry log line */
  label: string;
}

const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  maxAttempts: 3,
  jitterFraction: 0.25,
  label: 'Backoff',
};

/**
 * Transport-level failures worth another attempt: 5xx and 429 responses,
 * socket errors, and Ollama's "model is loading" answers.
 */
const TRANSIENT_PATTERN =
  /\b(429|500|502|503|504)\b|ECONNREFUSED|ECONNRESET|ETIMEDOUT|ENOTFOUND|socket hang up|fetch failed|model.*load/i;

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const cause = error.cause;
  const causeText =
    cause instanceof Error
      ? `${cause.message} ${'code' in cause && typeof cause.code === 'string' ? cause.code : ''}`
      : '';
  return TRANSIENT_PATTERN.test(`${error.message} ${causeText}`);
}

/**
 * Calculate delay for a given attempt (0-indexed) with jitter.
 *
 * Formula: min(baseDelay * 2^attempt, maxDelay) +/- jitter
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const exponentialDelay = cfg.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, cfg.maxDelayMs);

  const jitterRange = cappedDelay * cfg.jitterFraction;
  const jitter = (Math.random() * 2 - 1) * jitterRange;

  return Math.max(0, Math.round(cappedDelay + jitter));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with automatic retry and exponential backoff.
 *
 * Non-retryable errors are re-thrown immediately; the last error is
 * re-thrown once attempts run out.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  shouldRetry: (error: unknown) => boolean = isTransientError,
  config?: Partial<BackoffConfig>
): Promise<T> {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error)) throw error;
      if (attempt < cfg.maxAttempts - 1) {
        const delay = calculateBackoffDelay(attempt, cfg);
        console.error(
          `[${cfg.label}] Attempt ${attempt + 1}/${cfg.maxAttempts} failed: ${error instanceof Error ? error.message : String(error)}. Retrying in ${delay}ms`
        );
        await sleep(delay);
      }
    }
  }

  throw lastError;
}
