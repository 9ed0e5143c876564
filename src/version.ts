/**
 * Centralized version module
 * Reads version from package.json - single source of truth
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJson = PackageJsonSchema.parse(
  JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8'))
);

export const VERSION: string = packageJson.version;
