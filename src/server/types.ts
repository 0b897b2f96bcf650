/**
 * MCP Server Type Definitions
 *
 * @module server/types
 */

import type { DocumentSource } from '../services/documents/index.js';
import type { InferenceConfig, Oracle } from '../services/inference/index.js';
import type { PipelineConfig, TelemetrySink } from '../services/pipeline/index.js';
import type { DatabaseService } from '../services/storage/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server state. Collaborators are created lazily on first use; tests swap
 * them through configureServer().
 */
export interface ServerState {
  config: PipelineConfig;
  inferenceConfig: InferenceConfig;
  database: DatabaseService | null;
  source: DocumentSource | null;
  oracle: Oracle | null;
  telemetry: TelemetrySink | null;
}
