/**
 * Summarization Types
 *
 * Tasks, units and reports shared by the summarization driver, the batch
 * optimizer and the combiner.
 */

import type { CompressionStage } from './summarizer/types.js';

// =============================================================================
// TASKS AND UNITS
// =============================================================================

/**
 * One independent piece of text to summarize
 */
export interface SummaryTask {
  id: string;
  title: string;
  content: string;
  /** Storage key the summary is written under; unique per task */
  outputKey: string;
  /** Discovery order, used by the combiner */
  order: number;
}

/**
 * A summary produced from a task. `content` is the summary text.
 */
export interface SummaryUnit extends SummaryTask {
  tokenCount: number;
}

export type TaskOutcome =
  | { status: 'ok'; unit: SummaryUnit }
  | { status: 'failed'; taskId: string; reason: string };

/**
 * Driver output. `outcomes[i]` belongs to `tasks[i]`.
 */
export interface DriverResult {
  outcomes: TaskOutcome[];
  units: SummaryUnit[];
  successful: number;
  attempted: number;
}

/**
 * Called once per successful unit; a rejection drops that unit only
 */
export type PersistHook = (unit: SummaryUnit) => Promise<void>;

export interface DriverConfig {
  /** Maximum calls in flight */
  concurrency: number;
  /** Per-call timeout in ms */
  timeoutMs: number;
}

export const DEFAULT_DRIVER_CONFIG: DriverConfig = {
  concurrency: 2,
  timeoutMs: 120000,
};

// =============================================================================
// REDUCTION
// =============================================================================

/**
 * Reduction state machine:
 * PACKED -> REDUCED_1 -> REDUCED_2 -> DONE | DONE_OVER_BUDGET
 */
export type ReductionState = 'PACKED' | 'REDUCED_1' | 'REDUCED_2' | 'DONE' | 'DONE_OVER_BUDGET';

export interface TokenReport {
  totalTokens: number;
  targetTokens: number;
  metTarget: boolean;
}

export interface StageReport {
  stage: CompressionStage;
  successful: number;
  attempted: number;
}

export interface RoundReport extends StageReport {
  /** Unit total entering the round */
  inputTokens: number;
  /** Unit total after the round (previous total when the round produced nothing) */
  outputTokens: number;
}

export interface ReductionResult {
  units: SummaryUnit[];
  state: 'DONE' | 'DONE_OVER_BUDGET';
  /** Stages applied, counting the first-stage summaries */
  stagesRun: number;
  rounds: RoundReport[];
  report: TokenReport;
}

export interface OptimizerConfig {
  targetTokens: number;
  /** Stage ceiling including the first stage (1 to 3) */
  maxStages: number;
  /** Batch may exceed the ideal size by this factor */
  batchSlack: number;
  /** Share of the ideal size a batch must reach before a topic change closes it */
  topicSplitFloor: number;
}

export const DEFAULT_OPTIMIZER_CONFIG: OptimizerConfig = {
  targetTokens: 32000,
  maxStages: 3,
  batchSlack: 1.2,
  topicSplitFloor: 0.5,
};

/**
 * True when `next` starts a different topic from `previous`
 */
export type TopicBoundary = (previous: SummaryUnit, next: SummaryUnit) => boolean;
