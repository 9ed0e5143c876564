/**
 * Config Registry
 *
 * Assembles all configuration sections into a complete registry.
 * This is the single source of truth for config metadata.
 */

import type { ConfigRegistry } from './types.js';

import { pathsSection } from './sections/paths.js';
import { chunkingSection } from './sections/chunking.js';
import { tokenizerSection } from './sections/tokenizer.js';
import { summarizerSection } from './sections/summarizer.js';
import { optimizerSection } from './sections/optimizer.js';
import { retrySection } from './sections/retry.js';
import { loggingSection } from './sections/logging.js';
import { runtimeSection } from './sections/runtime.js';

/**
 * The complete config registry with all sections.
 */
export const configRegistry: ConfigRegistry = {
  sections: {
    paths: pathsSection,
    chunking: chunkingSection,
    tokenizer: tokenizerSection,
    summarizer: summarizerSection,
    optimizer: optimizerSection,
    retry: retrySection,
    logging: loggingSection,
    runtime: runtimeSection,
  },
};

// Re-export types and utilities
export type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta } from './types.js';
export {
  buildConfigSchema,
  getAllEnvVars,
  buildConfigFromRegistry,
} from './schema-builder.js';
