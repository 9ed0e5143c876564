/**
 * CLI Error Handling
 *
 * Provides consistent error handling for CLI commands.
 */

import { sanitizeErrorMessage } from '../../core/errors.js';
import { mapError } from '../../utils/error-mapper.js';

/**
 * Error payload written to stderr. Paths and credentials are redacted in
 * production.
 */
export function formatCliError(error: unknown): {
  output: { error: string; code: string; details?: Record<string, unknown> };
  exitCode: number;
} {
  const mapped = mapError(error);
  return {
    output: {
      error: sanitizeErrorMessage(mapped.message),
      code: mapped.code,
      ...(mapped.details ? { details: mapped.details } : {}),
    },
    exitCode: mapped.exitCode,
  };
}

/**
 * Handle CLI errors consistently
 */
export function handleCliError(error: unknown): never {
  const { output, exitCode } = formatCliError(error);
  console.error(JSON.stringify(output, null, 2));
  process.exit(exitCode);
}
