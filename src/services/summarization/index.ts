/**
 * Summarization Module
 *
 * Bounded-concurrency summarization of tasks and budget-driven reduction of
 * the resulting summaries.
 */

export * from './types.js';
export { SummarizationDriver } from './summarization-driver.js';
export {
  BatchOptimizer,
  renderBatch,
  totalTokens,
  BATCH_SEPARATOR,
  FINAL_SUMMARY_TITLE,
  type ReduceOptions,
} from './batch-optimizer.js';
export { firstWordTopicBoundary, titleTopic } from './topic-similarity.js';
export * from './summarizer/index.js';
