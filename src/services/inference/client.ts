/**
 * Ollama Inference Client
 *
 * Concrete implementation of the {@link Oracle} capability the pipeline
 * stages call: a system policy plus a context block in, raw model text out.
 * Connects to a locally running Ollama instance - no API key required.
 *
 *   ollama serve
 *   ollama pull llama3.1:8b
 *
 * Every call goes through retry-with-backoff for transient failures and a
 * shared circuit breaker, so a dead server fails a batch's documents fast
 * instead of waiting out the timeout on each one.
 *
 * @module services/inference/client
 */

import { z } from 'zod';

import { isTransientError, withRetry } from '../../utils/backoff.js';
import { createInferenceConfig, type InferenceConfig, type InferenceConfigInput } from './config.js';
import { CircuitBreaker, CircuitBreakerOpenError } from './circuit-breaker.js';

export { CircuitBreakerOpenError };

// ═══════════════════════════════════════════════════════════════════════════════
// ORACLE CONTRACT
// ═══════════════════════════════════════════════════════════════════════════════

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface InferenceRequest {
  /** Standing instructions for the stage (the "system policy") */
  systemPolicy: string;
  /** Document text and structured context for this call */
  context: string;
  model: string;
  maxOutputTokens?: number;
}

export interface InferenceResponse {
  text: string;
  usage: TokenUsage;
  model: string;
  processingTimeMs: number;
}

/**
 * Text-in / text-out reasoning capability behind the three pipeline stages.
 * The returned text is untrusted: it may not be JSON at all.
 */
export interface Oracle {
  infer(request: InferenceRequest): Promise<InferenceResponse>;
}

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

export class InferenceError extends Error {
  /** HTTP status when the server answered, null for transport failures */
  readonly status: number | null;
  readonly retryable: boolean;

  constructor(message: string, status: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InferenceError';
    this.status = status;
    this.retryable =
      status !== null ? RETRYABLE_STATUSES.has(status) : isTransientError(options?.cause);
  }
}

function shouldRetryInference(error: unknown): boolean {
  return error instanceof InferenceError ? error.retryable : isTransientError(error);
}

// ═══════════════════════════════════════════════════════════════════════════════
// OLLAMA CLIENT
// ═══════════════════════════════════════════════════════════════════════════════

const OllamaChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({ role: z.string(), content: z.string() }).optional(),
  done: z.boolean().optional(),
  eval_count: z.number().optional(),
  prompt_eval_count: z.number().optional(),
});

let _sharedCircuitBreaker: CircuitBreaker | null = null;

function getSharedCircuitBreaker(config: InferenceConfig['circuitBreaker']): CircuitBreaker {
  if (!_sharedCircuitBreaker) {
    _sharedCircuitBreaker = new CircuitBreaker(config);
  }
  return _sharedCircuitBreaker;
}

/** Reset shared breaker state (for testing) */
export function resetSharedCircuitBreaker(): void {
  _sharedCircuitBreaker = null;
}

export class InferenceClient implements Oracle {
  private readonly config: InferenceConfig;
  private readonly circuitBreaker: CircuitBreaker;

  constructor(config: InferenceConfig | InferenceConfigInput = {}) {
    this.config = createInferenceConfig(config);
    this.circuitBreaker = getSharedCircuitBreaker(this.config.circuitBreaker);
  }

  async infer(request: InferenceRequest): Promise<InferenceResponse> {
    const startTime = Date.now();
    const { maxAttempts, baseDelayMs, maxDelayMs } = this.config.retry;

    const response = await this.circuitBreaker.execute(() =>
      withRetry(() => this.callOllamaChat(request), shouldRetryInference, {
        maxAttempts,
        baseDelayMs,
        maxDelayMs,
        label: 'Inference',
      })
    );

    return { ...response, processingTimeMs: Date.now() - startTime };
  }

  /**
   * POST /api/chat with the policy as the system message. `format: "json"`
   * asks Ollama to constrain output to JSON; callers still treat the text as
   * untrusted.
   */
  private async callOllamaChat(
    request: InferenceRequest
  ): Promise<Omit<InferenceResponse, 'processingTimeMs'>> {
    const url = `${this.config.baseUrl}/api/chat`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    let rawResponse: Response;
    try {
      rawResponse = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: request.model,
          messages: [
            { role: 'system', content: request.systemPolicy },
            { role: 'user', content: request.context },
          ],
          format: 'json',
          stream: false,
          options: {
            temperature: this.config.temperature,
            num_predict: request.maxOutputTokens ?? this.config.maxOutputTokens,
          },
        }),
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new InferenceError(
          `Inference request timed out after ${this.config.timeoutMs}ms`,
          null,
          { cause: error }
        );
      }
      throw new InferenceError(
        `Inference transport failure: ${error instanceof Error ? error.message : String(error)}`,
        null,
        { cause: error }
      );
    } finally {
      clearTimeout(timeoutId);
    }

    if (!rawResponse.ok) {
      const body = await rawResponse.text().catch(() => '');
      throw new InferenceError(
        `Ollama API error ${rawResponse.status}: ${rawResponse.statusText}. ${body.slice(0, 200)}`,
        rawResponse.status
      );
    }

    const parsed = OllamaChatResponseSchema.safeParse(await rawResponse.json());
    if (!parsed.success) {
      throw new InferenceError(
        `Unexpected Ollama response shape: ${parsed.error.message}`,
        rawResponse.status
      );
    }

    const data = parsed.data;
    const inputTokens = data.prompt_eval_count ?? 0;
    const outputTokens = data.eval_count ?? 0;

    return {
      text: data.message?.content ?? '',
      model: data.model ?? request.model,
      usage: { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens },
    };
  }
}
