/**
 * Centralized configuration module
 *
 * Configuration is built from the registry at src/config/registry/.
 * Each option declares envKey, default, description, schema, and parser.
 *
 * To add a new config option:
 *   1. Find or create the section in src/config/registry/sections/
 *   2. Add the option with envKey, defaultValue, description, schema
 *   3. Add the field to the Config interface below
 *
 * Usage:
 *   import { config } from './config/index.js';
 *   console.log(config.optimizer.targetTokens);
 */

import { configRegistry, buildConfigSchema, buildConfigFromRegistry } from './registry/index.js';
import { formatZodErrors } from './registry/schema-builder.js';
import type { SummarizerProviderName } from './registry/parsers.js';

// =============================================================================
// CONFIGURATION INTERFACE
// =============================================================================

export type TokenizerEncoding = 'cl100k_base' | 'o200k_base' | 'estimate';

export interface Config {
  paths: {
    dataDir: string;
    input: string;
    chunks: string;
    summaries: string;
  };
  chunking: {
    maxTokens: number;
    formatOverhead: number;
    splitReserve: number;
  };
  tokenizer: {
    encoding: TokenizerEncoding;
  };
  summarizer: {
    provider: SummarizerProviderName;
    model: string | undefined;
    openaiApiKey: string | undefined;
    openaiBaseUrl: string | undefined;
    anthropicApiKey: string | undefined;
    ollamaBaseUrl: string;
    temperature: number;
    maxOutputTokens: number;
    timeoutMs: number;
    concurrency: number;
  };
  optimizer: {
    targetTokens: number;
    maxStages: number;
    batchSlack: number;
    topicSplitFloor: number;
  };
  retry: {
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
  };
  logging: {
    level: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';
  };
  runtime: {
    nodeEnv: string;
  };
}

const configSchema = buildConfigSchema(configRegistry);

/**
 * Build configuration from registry metadata.
 */
export function buildConfig(): Config {
  // Double-cast needed as the registry returns Record<string, unknown>;
  // the schema check below covers the shape
  const config = buildConfigFromRegistry(configRegistry) as unknown as Config;

  const result = configSchema.safeParse(config);
  if (!result.success) {
    const errors = formatZodErrors(result.error).map((e) => `  - ${e}`);
    console.warn(`Config validation warnings:\n${errors.join('\n')}`);
  }

  return config;
}

// Create the singleton config instance
export const config: Config = buildConfig();

export { configRegistry };
