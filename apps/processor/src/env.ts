import { config } from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { logger as rootLogger, type Logger } from './logger';

function findProjectRoot(startPath: string = process.cwd()): string {
  let current = resolve(startPath);
  while (current !== resolve(current, '..')) {
    if (existsSync(resolve(current, 'package.json')) && existsSync(resolve(current, 'packages'))) {
      return current;
    }
    current = resolve(current, '..');
  }
  return process.cwd();
}

/**
 * Load `.env` from the workspace root into `process.env`, if present.
 * Variables already set in the environment win.
 */
export function loadEnvFile(logger: Logger = rootLogger): void {
  const envPath = resolve(findProjectRoot(), '.env');
  if (!existsSync(envPath)) {
    logger.debug({ path: envPath }, 'No .env file found, using process environment');
    return;
  }

  const result = config({ path: envPath });
  if (result.error) {
    logger.warn({ error: result.error.message }, 'Failed to load .env file');
    return;
  }
  logger.info({ count: Object.keys(result.parsed ?? {}).length }, 'Loaded environment variables from .env');
}
