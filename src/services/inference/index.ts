/**
 * Inference service: the Oracle contract and its Ollama implementation.
 */

export {
  InferenceClient,
  InferenceError,
  resetSharedCircuitBreaker,
  CircuitBreakerOpenError,
  type Oracle,
  type InferenceRequest,
  type InferenceResponse,
  type TokenUsage,
} from './client.js';

export {
  type InferenceConfig,
  type InferenceConfigInput,
  InferenceConfigSchema,
  createInferenceConfig,
  loadInferenceConfig,
} from './config.js';

export { CircuitBreaker, CircuitState } from './circuit-breaker.js';
