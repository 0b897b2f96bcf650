/**
 * Loads .env before any configuration is read. First found wins:
 * 1. CASEFILE_ENV_FILE (explicit override)
 * 2. CWD/.env (project-local)
 * 3. Package root/.env (development)
 *
 * Import this module first from every entry point.
 *
 * @module env
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.CASEFILE_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
    break;
  }
}
