/**
 * Zod Schema Builder
 *
 * Builds Zod validation schemas from the config registry and builds the
 * raw config object from environment variables.
 */

import { z } from 'zod';
import type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta, ParserType } from './types.js';
import { parseNumber, parseInt_, parseString, resolveDataPath } from './parsers.js';

// =============================================================================
// SCHEMA BUILDING
// =============================================================================

/**
 * Build a Zod object schema for a single section
 */
export function buildSectionSchema(
  section: ConfigSectionMeta
): z.ZodObject<Record<string, z.ZodType>> {
  const shape: Record<string, z.ZodType> = {};

  for (const [key, option] of Object.entries(section.options)) {
    shape[key] = option.schema;
  }

  return z.object(shape);
}

/**
 * Build a complete Zod schema from the config registry
 */
export function buildConfigSchema(
  registry: ConfigRegistry
): z.ZodObject<Record<string, z.ZodType>> {
  const shape: Record<string, z.ZodType> = {};

  for (const [key, section] of Object.entries(registry.sections)) {
    shape[key] = buildSectionSchema(section);
  }

  return z.object(shape);
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

/**
 * Format Zod validation errors into human-readable messages
 */
export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((err) => {
    const path = err.path.map(String).join('.');
    return `${path}: ${err.message}`;
  });
}

// =============================================================================
// DOCUMENTATION HELPERS
// =============================================================================

export interface EnvVarDescription {
  envKey: string;
  description: string;
  defaultValue: unknown;
  sensitive: boolean;
  section: string;
}

/**
 * Get all environment variables from the registry
 */
export function getAllEnvVars(registry: ConfigRegistry): EnvVarDescription[] {
  const envVars: EnvVarDescription[] = [];

  for (const [sectionKey, section] of Object.entries(registry.sections)) {
    for (const option of Object.values(section.options)) {
      if (!option.envKey) continue;
      envVars.push({
        envKey: option.envKey,
        description: option.description,
        defaultValue: option.defaultValue,
        sensitive: option.sensitive ?? false,
        section: sectionKey,
      });
    }
  }

  return envVars;
}

// =============================================================================
// CONFIG BUILDING FROM REGISTRY
// =============================================================================

/**
 * Infer parser type from the default value when not explicitly specified
 */
function inferParser(defaultValue: unknown): ParserType {
  if (typeof defaultValue === 'number') return 'number';
  return 'string';
}

/**
 * Parse an environment variable value using the option's parser
 */
function parseEnvValue(option: ConfigOptionMeta, envValue: string | undefined): unknown {
  const { defaultValue } = option;

  if (typeof option.parse === 'function') {
    return option.parse(envValue, defaultValue);
  }

  const parserType: ParserType = option.parse ?? inferParser(defaultValue);

  // Path defaults are resolved too, not only env overrides
  if (parserType === 'path') {
    return resolveDataPath(envValue, String(defaultValue));
  }

  if (envValue === undefined || envValue === '') {
    return defaultValue;
  }

  const numericDefault = typeof defaultValue === 'number' ? defaultValue : 0;

  switch (parserType) {
    case 'number':
      return parseNumber(envValue, numericDefault);

    case 'int':
      return parseInt_(envValue, numericDefault);

    case 'string':
      if (option.allowedValues) {
        return parseString(envValue, String(defaultValue), option.allowedValues);
      }
      return envValue;
  }
}

/**
 * Build a config section from registry metadata
 */
function buildSectionFromRegistry(section: ConfigSectionMeta): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, option] of Object.entries(section.options)) {
    const envValue = option.envKey ? process.env[option.envKey] : undefined;
    result[key] = parseEnvValue(option, envValue);
  }

  return result;
}

/**
 * Build complete config from registry metadata.
 */
export function buildConfigFromRegistry(registry: ConfigRegistry): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, section] of Object.entries(registry.sections)) {
    result[key] = buildSectionFromRegistry(section);
  }

  return result;
}
