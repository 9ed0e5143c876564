import { DocSqueezeError, ErrorCodes } from '../core/errors.js';
import { createComponentLogger } from './logger.js';

const logger = createComponentLogger('error-mapper');

export interface MappedError {
  message: string;
  code: string;
  /** Process exit code hint */
  exitCode: number;
  details?: Record<string, unknown>;
}

/**
 * Map any error to a standardized internal format
 */
export function mapError(error: unknown): MappedError {
  // 1. Known DocSqueezeError
  if (error instanceof DocSqueezeError) {
    return {
      message: error.message,
      code: error.code,
      exitCode: getExitCodeForErrorCode(error.code),
      ...(error.context ? { details: error.context } : {}),
    };
  }

  // 2. Standard errors
  if (error instanceof Error) {
    const message = error.message;

    if (message.includes('Validation error') || message.includes('is required')) {
      return { message, code: ErrorCodes.INVALID_PARAMETER, exitCode: 2 };
    }
    if (message.includes('not found')) {
      return { message, code: ErrorCodes.NOT_FOUND, exitCode: 1 };
    }

    logger.warn({ error: message }, 'Unmapped internal error');
    return { message, code: ErrorCodes.INTERNAL_ERROR, exitCode: 1 };
  }

  // 3. Fallback
  logger.warn({ error: String(error) }, 'Unmapped unknown error');
  return { message: String(error), code: ErrorCodes.UNKNOWN_ERROR, exitCode: 1 };
}

function getExitCodeForErrorCode(code: string): number {
  switch (code) {
    case ErrorCodes.MISSING_REQUIRED_FIELD:
    case ErrorCodes.INVALID_PARAMETER:
    case ErrorCodes.SIZE_LIMIT_EXCEEDED:
      return 2;

    case ErrorCodes.PIPELINE_ABORTED:
      return 130;

    default:
      return 1;
  }
}
