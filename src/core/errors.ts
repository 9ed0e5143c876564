/**
 * Core error definitions
 *
 * All error classes, codes, and factory functions shared by the pipeline
 * stages, the storage layer, and the CLI.
 */

/**
 * Sanitize error messages to remove sensitive information in production.
 * Strips file system paths and connection strings.
 */
export function sanitizeErrorMessage(message: string): string {
  // Check production mode dynamically for testability
  if (process.env.NODE_ENV !== 'production') {
    return message;
  }

  return (
    message
      // Unix paths
      .replace(
        /\/(?:Users|home|var|tmp|etc|opt|usr|private|root|srv|mnt)\/[^\s:,)'"]+/gi,
        '[REDACTED_PATH]'
      )
      // Windows paths
      .replace(/[A-Z]:\\[^\s:,)'"]+/gi, '[REDACTED_PATH]')
      // URLs carrying credentials
      .replace(/[a-z]+:\/\/[^:\s]+:[^@\s]+@[^\s]+/gi, '[REDACTED_URL]')
  );
}

export class DocSqueezeError extends Error {
  constructor(
    message: string,
    public code: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DocSqueezeError';
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error codes for programmatic handling
 */
export const ErrorCodes = {
  // Validation errors (1000-1999)
  MISSING_REQUIRED_FIELD: 'E1000',
  INVALID_PARAMETER: 'E1004',
  SIZE_LIMIT_EXCEEDED: 'E1005',

  // Resource errors (2000-2999)
  NOT_FOUND: 'E2000',

  // Storage errors (4000-4999)
  STORAGE_READ_FAILED: 'E4100',
  STORAGE_WRITE_FAILED: 'E4101',

  // System errors (5000-5999)
  UNKNOWN_ERROR: 'E5000',
  INTERNAL_ERROR: 'E5001',
  SERVICE_UNAVAILABLE: 'E5002',
  RESOURCE_EXHAUSTED: 'E5005',
  PIPELINE_ABORTED: 'E5010',

  // Summarization errors (7000-7999)
  SUMMARIZATION_EMPTY: 'E7002',

  // External errors (10000-10999)
  TIMEOUT: 'E10002',
} as const;

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * Resource exhausted error (semaphores, queues)
 */
export class ResourceExhaustedError extends DocSqueezeError {
  constructor(
    public readonly resource: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(message, ErrorCodes.RESOURCE_EXHAUSTED, { ...context, resource });
    this.name = 'ResourceExhaustedError';
  }
}

/**
 * Timeout error
 */
export class TimeoutError extends DocSqueezeError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
    context?: Record<string, unknown>
  ) {
    super(`Operation '${operation}' timed out after ${timeoutMs}ms`, ErrorCodes.TIMEOUT, {
      ...context,
      operation,
      timeoutMs,
    });
    this.name = 'TimeoutError';
  }
}

/**
 * Storage read/write failure for a single key
 */
export class StorageError extends DocSqueezeError {
  constructor(
    public readonly operation: 'read' | 'write' | 'list' | 'remove',
    public readonly path: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Storage ${operation} failed for ${path}: ${reason}`,
      operation === 'write' || operation === 'remove'
        ? ErrorCodes.STORAGE_WRITE_FAILED
        : ErrorCodes.STORAGE_READ_FAILED,
      { operation, path }
    );
    this.name = 'StorageError';
    this.cause = cause;
  }
}

/**
 * Raised at a round or stage boundary once the run has been cancelled
 */
export class PipelineAbortedError extends DocSqueezeError {
  constructor(public readonly boundary: string) {
    super(`Pipeline aborted before ${boundary}`, ErrorCodes.PIPELINE_ABORTED, { boundary });
    this.name = 'PipelineAbortedError';
  }
}

/**
 * Create a validation error with helpful context
 */
export function createValidationError(
  field: string,
  message: string,
  suggestion?: string
): DocSqueezeError {
  return new DocSqueezeError(
    `Validation error: ${field} - ${message}${suggestion ? `. Suggestion: ${suggestion}` : ''}`,
    ErrorCodes.MISSING_REQUIRED_FIELD,
    { field, suggestion }
  );
}

/**
 * Create a size limit exceeded error
 */
export function createSizeLimitError(
  field: string,
  maxSize: number,
  actualSize: number,
  unit: string = 'characters'
): DocSqueezeError {
  return new DocSqueezeError(
    `${field} exceeds maximum ${unit} of ${maxSize} (got ${actualSize})`,
    ErrorCodes.SIZE_LIMIT_EXCEEDED,
    { field, maxSize, actualSize, unit }
  );
}

/**
 * Create a service unavailable error
 */
export function createServiceUnavailableError(service: string, reason?: string): DocSqueezeError {
  const message = reason ? `${service} is unavailable: ${reason}` : `${service} is unavailable`;
  return new DocSqueezeError(message, ErrorCodes.SERVICE_UNAVAILABLE, {
    service,
    suggestion: `Check ${service} configuration and dependencies`,
  });
}

/**
 * Create a summarization error for an empty or unusable model response
 */
export function createEmptySummaryError(provider: string): DocSqueezeError {
  return new DocSqueezeError(
    `Summarization returned no content (${provider})`,
    ErrorCodes.SUMMARIZATION_EMPTY,
    { provider }
  );
}
