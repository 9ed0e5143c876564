// Main entry point for docsqueeze (library usage)

export * from './core/errors.js';
export { config, buildConfig, type Config, type TokenizerEncoding } from './config/index.js';
export { createComponentLogger } from './utils/logger.js';

export * from './services/tokenizer/index.js';
export * from './services/chunking/index.js';
export * from './services/summarization/index.js';
export * from './services/combiner/index.js';
export * from './services/storage/index.js';
export * from './services/pipeline/index.js';
