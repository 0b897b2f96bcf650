/**
 * MCP Server State Management
 *
 * Holds the resolved configuration and the lazily opened database and
 * pipeline collaborators. Configuration is resolved once, at startup.
 *
 * @module server/state
 */

import { HttpDocumentSource } from '../services/documents/index.js';
import { InferenceClient } from '../services/inference/index.js';
import {
  PipelineOrchestrator,
  TelemetryClient,
  type PipelineConfig,
} from '../services/pipeline/index.js';
import { DatabaseService } from '../services/storage/index.js';
import { configurationError } from './errors.js';
import type { ServerState } from './types.js';

let state: ServerState | null = null;

/**
 * Install configuration (and optionally pre-built collaborators). Any
 * previously opened database is closed.
 */
export function configureServer(
  init: Pick<ServerState, 'config' | 'inferenceConfig'> & Partial<ServerState>
): void {
  resetServerState();
  state = {
    database: null,
    source: null,
    oracle: null,
    telemetry: null,
    ...init,
  };
}

function requireState(): ServerState {
  if (!state) {
    throw configurationError('Server is not configured; configureServer() must run at startup');
  }
  return state;
}

export function getPipelineConfig(): PipelineConfig {
  return requireState().config;
}

/**
 * Database for the configured name, created on first use.
 */
export function requireDatabase(): DatabaseService {
  const current = requireState();
  if (!current.database) {
    current.database = DatabaseService.openOrCreate(
      current.config.databaseName,
      current.config.storagePath
    );
    console.error(`[State] Database "${current.config.databaseName}" opened`);
  }
  return current.database;
}

export function requireOrchestrator(): PipelineOrchestrator {
  const current = requireState();
  const store = requireDatabase();
  current.source ??= new HttpDocumentSource({ timeoutMs: current.config.fetchTimeoutMs });
  current.oracle ??= new InferenceClient(current.inferenceConfig);
  current.telemetry ??= new TelemetryClient(current.config.telemetry);
  return new PipelineOrchestrator({
    source: current.source,
    oracle: current.oracle,
    store,
    config: current.config,
    telemetry: current.telemetry,
  });
}

/**
 * Close the database and forget all state (shutdown and tests).
 */
export function resetServerState(): void {
  if (state?.database) {
    state.database.close();
  }
  state = null;
}
