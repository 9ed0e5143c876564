/**
 * CLI Context Utilities
 *
 * Builds the pipeline for one CLI invocation and wires Ctrl-C to its abort
 * signal. A second Ctrl-C exits immediately.
 */

import { config, type Config } from '../../config/index.js';
import { createPipelineService, type PipelineService } from '../../services/pipeline/index.js';
import { createComponentLogger } from '../../utils/logger.js';

const logger = createComponentLogger('cli');

export interface CliContext {
  pipeline: PipelineService;
  signal: AbortSignal;
}

/**
 * Per-invocation overrides of configured values
 */
export interface PipelineOverrides {
  chunkMaxTokens?: number;
  targetTokens?: number;
  concurrency?: number;
}

let cached: { context: CliContext; onSigint: () => void } | null = null;

export function applyOverrides(base: Config, overrides: PipelineOverrides): Config {
  return {
    ...base,
    chunking: {
      ...base.chunking,
      maxTokens: overrides.chunkMaxTokens ?? base.chunking.maxTokens,
    },
    optimizer: {
      ...base.optimizer,
      targetTokens: overrides.targetTokens ?? base.optimizer.targetTokens,
    },
    summarizer: {
      ...base.summarizer,
      concurrency: overrides.concurrency ?? base.summarizer.concurrency,
    },
  };
}

/**
 * Initialize the pipeline for CLI usage (cached per invocation)
 */
export function getCliContext(overrides: PipelineOverrides = {}): CliContext {
  if (cached) return cached.context;

  const controller = new AbortController();
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    logger.warn('Interrupt received, stopping at the next stage boundary');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  const context: CliContext = {
    pipeline: createPipelineService(applyOverrides(config, overrides)),
    signal: controller.signal,
  };
  cached = { context, onSigint };
  return context;
}

/**
 * Shutdown CLI context cleanly
 */
export function shutdownCliContext(): void {
  if (cached) {
    process.off('SIGINT', cached.onSigint);
    cached = null;
  }
}
