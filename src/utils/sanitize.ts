/**
 * Sanitization utilities for logging
 * Masks provider credentials before they reach a log line
 */

const SENSITIVE_KEY_PATTERNS = [/api[-_]?key/i, /token$/i, /secret/i, /password/i, /authorization/i];

/**
 * Credential formats accepted by the summarization providers
 */
const API_KEY_PATTERNS = [
  // Anthropic API keys: sk-ant-...
  /sk-ant-[a-zA-Z0-9\-_]{20,}/g,

  // OpenAI API keys: sk-... (including project keys sk-proj-...)
  /sk-[a-zA-Z0-9\-_]{20,}/g,

  // Bearer tokens
  /bearer\s+[a-zA-Z0-9\-._~+/]+=*/gi,
];

const REDACTED = '***REDACTED***';

/**
 * Sanitize a value for safe logging.
 * Recursively processes objects and arrays.
 */
export function sanitizeForLogging(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return maskSensitiveStrings(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => sanitizeForLogging(item));
  }

  if (typeof value === 'object') {
    const sanitized: Record<string, unknown> = {};

    for (const [key, val] of Object.entries(value)) {
      sanitized[key] = isSensitiveKey(key) ? REDACTED : sanitizeForLogging(val);
    }

    return sanitized;
  }

  return value;
}

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Mask API keys in a string, keeping a short prefix for context
 */
export function maskSensitiveStrings(str: string): string {
  let masked = str;

  for (const pattern of API_KEY_PATTERNS) {
    masked = masked.replace(pattern, (match) => `${match.substring(0, 3)}...${REDACTED}`);
  }

  return masked;
}
