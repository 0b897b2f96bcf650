/**
 * CLI runner: turns a parsed command into a pipeline run and a JSON report.
 *
 * Exit codes: 0 every document succeeded, 2 partial success,
 * 1 nothing succeeded or a usage/configuration error.
 *
 * @module cli/run
 */

import { readFile } from 'fs/promises';

import type {
  BatchResult,
  DocumentRunResult,
  PipelineOrchestrator,
} from '../services/pipeline/index.js';
import { createBatchId } from '../services/pipeline/index.js';
import { CliUsageError, parseCliArgs, parseUrlList, USAGE } from './args.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_PARTIAL = 2;

export interface CliIo {
  /** Receives the final JSON report */
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (path: string) => Promise<string>;
}

export interface CliDeps {
  /** Built lazily so usage errors never touch configuration or the store */
  createOrchestrator: () => PipelineOrchestrator;
  io?: Partial<CliIo>;
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  readFile: (path) => readFile(path, 'utf-8'),
};

export function exitCodeForBatch(result: Pick<BatchResult, 'successful' | 'total'>): number {
  if (result.total > 0 && result.successful === result.total) return EXIT_SUCCESS;
  return result.successful > 0 ? EXIT_PARTIAL : EXIT_FAILURE;
}

export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const io: CliIo = { ...defaultIo, ...deps.io };

  try {
    const command = parseCliArgs(argv);

    if (command.mode === 'help') {
      io.stderr(USAGE);
      return EXIT_SUCCESS;
    }

    if (command.mode === 'single') {
      const orchestrator = deps.createOrchestrator();
      const batchId = createBatchId(command.batchLabel);
      let result: DocumentRunResult;
      try {
        result = await orchestrator.processDocument(command.url, batchId);
      } catch (error) {
        result = {
          url: command.url,
          status: 'error',
          error: error instanceof Error ? error.message : String(error),
        };
      }
      io.stdout(JSON.stringify({ batchId, ...result }, null, 2));
      return result.status === 'success' ? EXIT_SUCCESS : EXIT_FAILURE;
    }

    const urls = [...command.urls];
    if (command.file !== null) {
      urls.push(...parseUrlList(await io.readFile(command.file)));
    }
    const orchestrator = deps.createOrchestrator();
    const result = await orchestrator.processBatch(urls, command.batchLabel, {
      delayMs: command.delaySeconds !== null ? Math.round(command.delaySeconds * 1000) : undefined,
    });
    io.stdout(JSON.stringify(result, null, 2));
    return exitCodeForBatch(result);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr(`[CLI] ${message}`);
    if (error instanceof CliUsageError) {
      io.stderr(USAGE);
    }
    return EXIT_FAILURE;
  }
}
