/**
 * Command-line argument parsing.
 *
 *   casefile-radar <url> [batch_label]
 *   casefile-radar --batch <label> [--delay <seconds>] [--file <path>] [url ...]
 *
 * @module cli/args
 */

export const USAGE = [
  'Usage:',
  '  casefile-radar <url> [batch_label]',
  '  casefile-radar --batch <label> [--delay <seconds>] [--file <path>] [url ...]',
].join('\n');

export type CliCommand =
  | { mode: 'single'; url: string; batchLabel: string }
  | { mode: 'batch'; batchLabel: string; urls: string[]; file: string | null; delaySeconds: number | null }
  | { mode: 'help' };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function takeValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

/**
 * @throws CliUsageError on unknown flags, missing values or a bad argument count
 */
export function parseCliArgs(argv: string[]): CliCommand {
  if (argv.length === 0) {
    throw new CliUsageError('No document URL given');
  }
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }

  let batchLabel: string | null = null;
  let file: string | null = null;
  let delaySeconds: number | null = null;
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    switch (token) {
      case '--batch':
        batchLabel = takeValue(argv, i, token);
        i++;
        break;
      case '--file':
        file = takeValue(argv, i, token);
        i++;
        break;
      case '--delay': {
        const raw = takeValue(argv, i, token);
        const parsed = Number(raw);
        if (!Number.isFinite(parsed) || parsed < 0) {
          throw new CliUsageError(`--delay must be a non-negative number of seconds, got "${raw}"`);
        }
        delaySeconds = parsed;
        i++;
        break;
      }
      default:
        if (token.startsWith('--')) {
          throw new CliUsageError(`Unknown option ${token}`);
        }
        positional.push(token);
    }
  }

  if (batchLabel !== null) {
    if (positional.length === 0 && file === null) {
      throw new CliUsageError('Batch mode needs URLs as arguments or --file');
    }
    return { mode: 'batch', batchLabel, urls: positional, file, delaySeconds };
  }

  if (file !== null || delaySeconds !== null) {
    throw new CliUsageError('--file and --delay are only valid with --batch');
  }
  if (positional.length > 2) {
    throw new CliUsageError('Single-document mode takes <url> [batch_label]');
  }
  return { mode: 'single', url: positional[0], batchLabel: positional[1] ?? 'manual' };
}

/** One URL per line; blank lines and `#` comments are skipped */
export function parseUrlList(contents: string): string[] {
  return contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}
