/**
 * Config Registry Type Definitions
 *
 * Metadata-driven configuration with Zod validation.
 * Each option declares envKey, default, description, schema, and parser.
 */

import type { z } from 'zod';

// =============================================================================
// PARSER TYPES
// =============================================================================

/**
 * Built-in parser types for common env var conversions
 */
export type ParserType =
  | 'string' // Direct string value
  | 'number' // parseFloat
  | 'int' // parseInt
  | 'path'; // Resolve relative to data dir

/**
 * Custom parser function type
 */
export type CustomParser<T> = (envValue: string | undefined, defaultValue: T) => T;

// =============================================================================
// CONFIG OPTION TYPES
// =============================================================================

/**
 * Metadata for a single configuration option
 */
export interface ConfigOptionMeta<T = unknown> {
  /** Environment variable key (e.g., 'DOCSQUEEZE_TARGET_TOKENS') */
  envKey: string;

  /** Default value when env var is not set */
  defaultValue: T;

  /** Description for documentation */
  description: string;

  /** Zod schema for validation */
  schema: z.ZodType<T>;

  /** Parser type or custom parser function */
  parse?: ParserType | CustomParser<T>;

  /** Allowed values for string enums (used with 'string' parser) */
  allowedValues?: readonly string[];

  /** Whether this is a sensitive value (API keys) - hidden in listings */
  sensitive?: boolean;
}

// =============================================================================
// CONFIG SECTION TYPES
// =============================================================================

/**
 * Metadata for a configuration section (group of related options)
 */
export interface ConfigSectionMeta {
  /** Section name (e.g., 'chunking', 'optimizer') */
  name: string;

  /** Section description for documentation */
  description: string;

  /** Options in this section, keyed by config property name */
  options: Record<string, ConfigOptionMeta>;
}

/**
 * Complete registry of all configuration options
 */
export interface ConfigRegistry {
  sections: Record<string, ConfigSectionMeta>;
}
