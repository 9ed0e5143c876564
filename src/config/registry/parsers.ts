/**
 * Config Parser Functions
 *
 * Type-safe parsers for environment variable values.
 * These handle string-to-type conversion with defaults and validation.
 */

import { resolve, isAbsolute } from 'node:path';

// =============================================================================
// PRIMITIVE PARSERS
// =============================================================================

/**
 * Parse a string env var as floating point number.
 */
export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a string env var as integer.
 */
export function parseInt_(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a string env var with validation against allowed values.
 */
export function parseString(
  value: string | undefined,
  defaultValue: string,
  allowedValues?: readonly string[]
): string {
  if (value === undefined || value === '') return defaultValue;
  const lower = value.toLowerCase();
  if (allowedValues && !allowedValues.includes(lower)) {
    return defaultValue;
  }
  return lower;
}

// =============================================================================
// PATH HELPERS
// =============================================================================

/**
 * Expand tilde (~) to home directory in file paths.
 */
export function expandTilde(filePath: string): string {
  if (filePath.startsWith('~/') || filePath === '~') {
    const home = process.env.HOME || process.env.USERPROFILE || '';
    return filePath.replace(/^~/, home);
  }
  return filePath;
}

/**
 * Get the base data directory.
 * DOCSQUEEZE_DATA_DIR wins; otherwise the current working directory.
 */
export function getDataDir(): string {
  const dataDir = process.env.DOCSQUEEZE_DATA_DIR;
  if (dataDir) {
    return resolve(expandTilde(dataDir));
  }
  return process.cwd();
}

/**
 * Resolve a data path with priority:
 * 1. Specific env var override (absolute, or relative to the data dir)
 * 2. Data dir + default relative path
 */
export function resolveDataPath(envVar: string | undefined, relativePath: string): string {
  if (envVar) {
    const expanded = expandTilde(envVar);
    return isAbsolute(expanded) ? expanded : resolve(getDataDir(), expanded);
  }
  return resolve(getDataDir(), relativePath);
}

// =============================================================================
// PROVIDER DETECTION
// =============================================================================

export type SummarizerProviderName = 'openai' | 'anthropic' | 'ollama' | 'disabled';

/**
 * Determine summarizer provider with fallback logic.
 * Checks for API keys in order: OpenAI > Anthropic > disabled.
 */
export function getSummarizerProvider(): SummarizerProviderName {
  const providerEnv = process.env.DOCSQUEEZE_SUMMARIZER_PROVIDER?.toLowerCase();
  if (providerEnv === 'disabled') return 'disabled';
  if (providerEnv === 'ollama') return 'ollama';
  if (providerEnv === 'anthropic') return 'anthropic';
  if (providerEnv === 'openai') return 'openai';
  if (process.env.OPENAI_API_KEY) return 'openai';
  if (process.env.ANTHROPIC_API_KEY) return 'anthropic';
  return 'disabled';
}
