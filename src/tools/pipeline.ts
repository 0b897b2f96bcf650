/**
 * Pipeline MCP Tools
 *
 * Tools: radar_process_document, radar_process_batch
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/pipeline
 */

import { z } from 'zod';

import { requireOrchestrator } from '../server/state.js';
import { successResult } from '../server/types.js';
import { createBatchId } from '../services/pipeline/index.js';
import { ProcessBatchInput, ProcessDocumentInput, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle radar_process_document - Run one document through the full pipeline
 */
export async function handleProcessDocument(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ProcessDocumentInput, params);
    const orchestrator = requireOrchestrator();
    const batchId = createBatchId(input.batch_label);
    const result = await orchestrator.processDocument(input.url, batchId);

    return formatResponse(
      successResult({
        batch_id: batchId,
        ...result,
        next_steps: [
          { tool: 'radar_review_queue', description: 'Review conflicts and victim diversions' },
          { tool: 'radar_stats', description: 'See updated record counts' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle radar_process_batch - Process documents sequentially; per-document
 * failures are reported in the results, not raised
 */
export async function handleProcessBatch(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ProcessBatchInput, params);
    const orchestrator = requireOrchestrator();
    const result = await orchestrator.processBatch(input.urls, input.batch_label, {
      delayMs: input.delay_seconds !== undefined ? Math.round(input.delay_seconds * 1000) : undefined,
    });

    return formatResponse(successResult(result));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export const pipelineTools: Record<string, ToolDefinition> = {
  radar_process_document: {
    description:
      'Fetch one document (PDF or HTML) and run extraction, verification, decision and the victim-protected record write. Returns write counts and the document reference.',
    inputSchema: {
      url: z.string().describe('Absolute http(s) URL of the document'),
      batch_label: z.string().optional().describe('Batch label recorded on the document (default: manual)'),
    },
    handler: handleProcessDocument,
  },
  radar_process_batch: {
    description:
      'Process an ordered list of document URLs one at a time. A failed document is recorded and the batch continues. Returns "<successful>/<total>" and per-document results.',
    inputSchema: {
      urls: z.array(z.string()).describe('Document URLs, processed in order'),
      batch_label: z.string().describe('Batch label'),
      delay_seconds: z
        .number()
        .optional()
        .describe('Pause between documents in seconds (default from configuration)'),
    },
    handler: handleProcessBatch,
  },
};
