/**
 * Startup configuration
 *
 * Resolves both configuration values from the environment once and installs
 * them in server state. Invalid values fail here, before any tool runs.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import { loadInferenceConfig } from '../services/inference/index.js';
import { loadPipelineConfig } from '../services/pipeline/index.js';
import { configureServer } from './state.js';

/**
 * @throws ValidationError on malformed CASEFILE_* values
 */
export function initializeServerConfig(): void {
  const config = loadPipelineConfig();
  const inferenceConfig = loadInferenceConfig();

  const warnings: string[] = [];
  if (!process.env.CASEFILE_OLLAMA_URL) {
    warnings.push(`CASEFILE_OLLAMA_URL is not set; using ${inferenceConfig.baseUrl}`);
  }
  if (warnings.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      console.error(`  - ${w}`);
    }
    console.error('========================');
  }

  console.error(
    `[Config] models: extraction=${config.models.extraction} verification=${config.models.verification} ` +
      `decision=${config.models.decision}; database=${config.databaseName}; ` +
      `telemetry=${config.telemetry.endpoint ? 'on' : 'off'}`
  );

  configureServer({ config, inferenceConfig });
}
