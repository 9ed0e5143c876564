import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';

/**
 * Load environment variables from a .env file in the given directory.
 *
 * Must run before the config module is first imported.
 */
export function loadEnv(baseDir: string): void {
  // Guard: only load once
  if (process.env.__DOCSQUEEZE_ENV_LOADED) return;

  const envPath = resolve(baseDir, '.env');
  if (existsSync(envPath)) {
    dotenvConfig({ path: envPath });
  }

  process.env.__DOCSQUEEZE_ENV_LOADED = '1';
}
