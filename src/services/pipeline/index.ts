/**
 * Extraction → Verification → Decision pipeline, record writer and batch
 * orchestrator.
 */

export {
  DEFAULT_PROTECTED_TERMS,
  PipelineConfigSchema,
  createPipelineConfig,
  loadPipelineConfig,
  type PipelineConfig,
  type PipelineConfigInput,
} from './config.js';
export { parseOracleJson, type OracleJsonResult } from './json.js';
export { runExtraction, type ExtractionOutcome } from './extraction.js';
export { assembleContext, NO_CONTEXT_SENTINEL } from './context.js';
export { runVerification } from './verification.js';
export { runDecision } from './decision.js';
export type { StageOutcome } from './stage.js';
export { writeRecords, type WriteInput, type WriteSummary } from './writer.js';
export { matchesProtectedTerm } from './victim-protection.js';
export {
  PipelineOrchestrator,
  createBatchId,
  type BatchOptions,
  type BatchResult,
  type DocumentRunResult,
  type DocumentRunSuccess,
  type DocumentRunFailure,
  type OrchestratorDeps,
} from './orchestrator.js';
export { TelemetryClient, type TelemetrySink, type TelemetryProps } from './telemetry.js';
