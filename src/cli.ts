#!/usr/bin/env node
/**
 * Casefile Radar - command-line entry point
 *
 * Processes one document or a batch and prints the JSON report on stdout.
 * Progress logging goes to stderr.
 *
 * @module cli
 */

import './env.js';

import { runCli } from './cli/run.js';
import { initializeServerConfig } from './server/startup.js';
import { requireOrchestrator, resetServerState } from './server/state.js';

runCli(process.argv.slice(2), {
  createOrchestrator: () => {
    initializeServerConfig();
    return requireOrchestrator();
  },
})
  .then((code) => {
    resetServerState();
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[CLI] Fatal:', error);
    process.exitCode = 1;
  });
