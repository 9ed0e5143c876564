/**
 * Batch Optimizer
 *
 * Reduces a set of summary units until their total fits the token target:
 *
 *   PACKED     first-stage summaries, over budget
 *   REDUCED_1  token-bounded, topic-coherent batches re-summarized (aggressive)
 *   REDUCED_2  everything collapsed into one summary (extreme)
 *   DONE | DONE_OVER_BUDGET
 *
 * Running out of stages is a status, not an error.
 */

import { PipelineAbortedError } from '../../core/errors.js';
import { createComponentLogger } from '../../utils/logger.js';
import type { SummarizationDriver } from './summarization-driver.js';
import { firstWordTopicBoundary } from './topic-similarity.js';
import {
  DEFAULT_OPTIMIZER_CONFIG,
  type OptimizerConfig,
  type ReductionResult,
  type ReductionState,
  type RoundReport,
  type SummaryTask,
  type SummaryUnit,
  type TokenReport,
  type TopicBoundary,
} from './types.js';

const logger = createComponentLogger('batch-optimizer');

export const BATCH_SEPARATOR = '\n\n---\n\n';
export const FINAL_SUMMARY_TITLE = 'Final Optimized Summary';

export function totalTokens(units: readonly SummaryUnit[]): number {
  return units.reduce((sum, unit) => sum + unit.tokenCount, 0);
}

/**
 * Render units for one re-summarization call
 */
export function renderBatch(units: readonly SummaryUnit[]): string {
  return units.map((unit) => `# ${unit.title}\n${unit.content}`).join(BATCH_SEPARATOR);
}

export interface ReduceOptions {
  /** Checked at every round boundary */
  signal?: AbortSignal;
}

export class BatchOptimizer {
  private readonly config: OptimizerConfig;

  constructor(
    private readonly driver: SummarizationDriver,
    config: Partial<OptimizerConfig> = {},
    private readonly isTopicBoundary: TopicBoundary = firstWordTopicBoundary
  ) {
    this.config = { ...DEFAULT_OPTIMIZER_CONFIG, ...config };
  }

  getConfig(): OptimizerConfig {
    return { ...this.config };
  }

  /**
   * Group units into batches near total / ceil(total / target) tokens each.
   * Largest units go first; a batch also closes at a topic change once it is
   * reasonably full.
   */
  groupIntoBatches(units: readonly SummaryUnit[]): SummaryUnit[][] {
    const { targetTokens, batchSlack, topicSplitFloor } = this.config;
    const total = totalTokens(units);
    const numBatches = Math.ceil(total / targetTokens);
    const idealBatchTokens = numBatches > 0 ? Math.floor(total / numBatches) : targetTokens;
    const sizeLimit = idealBatchTokens * batchSlack;
    const topicFloor = idealBatchTokens * topicSplitFloor;

    const sorted = [...units].sort((a, b) => b.tokenCount - a.tokenCount);
    const batches: SummaryUnit[][] = [];
    let batch: SummaryUnit[] = [];
    let batchTokens = 0;

    for (const unit of sorted) {
      const previous = batch[batch.length - 1];
      if (previous) {
        const overSize = batchTokens + unit.tokenCount > sizeLimit;
        const topicChange = this.isTopicBoundary(previous, unit) && batchTokens >= topicFloor;
        if (overSize || topicChange) {
          batches.push(batch);
          batch = [];
          batchTokens = 0;
        }
      }
      batch.push(unit);
      batchTokens += unit.tokenCount;
    }
    if (batch.length > 0) {
      batches.push(batch);
    }

    return batches;
  }

  /**
   * Reduce units toward the target. Units already within budget come back
   * unchanged with state DONE.
   */
  async reduce(units: readonly SummaryUnit[], options: ReduceOptions = {}): Promise<ReductionResult> {
    const { targetTokens, maxStages } = this.config;
    const rounds: RoundReport[] = [];
    let current: SummaryUnit[] = [...units];
    let state: ReductionState = 'PACKED';
    let stagesRun = 1;

    const finish = (): ReductionResult => {
      const report = this.buildReport(current);
      const final = report.metTarget ? 'DONE' : 'DONE_OVER_BUDGET';
      logger.info({ from: state, to: final, ...report, stagesRun }, 'Reduction finished');
      return { units: current, state: final, stagesRun, rounds, report };
    };

    if (current.length === 0 || totalTokens(current) <= targetTokens) {
      return finish();
    }

    // Aggressive round over batches
    if (stagesRun >= maxStages) return finish();
    this.checkAborted(options.signal, 'aggressive round');

    const batches = this.groupIntoBatches(current);
    logger.info(
      { inputTokens: totalTokens(current), targetTokens, batches: batches.length },
      'Starting aggressive round'
    );
    const batchTasks: SummaryTask[] = batches.map((batch, i) => ({
      id: `optimized-batch-${i + 1}`,
      title: `Optimized Batch ${i + 1}`,
      content: renderBatch(batch),
      outputKey: `optimized_batch_${i + 1}`,
      order: i,
    }));
    current = await this.runRound(current, batchTasks, 'aggressive', rounds);
    stagesRun++;
    state = 'REDUCED_1';

    if (totalTokens(current) <= targetTokens) return finish();

    // Extreme collapse into a single unit
    if (stagesRun >= maxStages) return finish();
    this.checkAborted(options.signal, 'extreme round');

    logger.info({ inputTokens: totalTokens(current), targetTokens }, 'Starting extreme round');
    const finalTask: SummaryTask = {
      id: 'final-optimized-summary',
      title: FINAL_SUMMARY_TITLE,
      content: renderBatch(current),
      outputKey: 'final_optimized_summary',
      order: 0,
    };
    current = await this.runRound(current, [finalTask], 'extreme', rounds);
    stagesRun++;
    state = 'REDUCED_2';

    return finish();
  }

  /**
   * Run one round. A round that produces nothing keeps the previous units.
   */
  private async runRound(
    previous: SummaryUnit[],
    tasks: SummaryTask[],
    stage: 'aggressive' | 'extreme',
    rounds: RoundReport[]
  ): Promise<SummaryUnit[]> {
    const result = await this.driver.summarizeAll(tasks, stage);
    const next = result.units.length > 0 ? result.units : previous;

    if (result.units.length === 0) {
      logger.warn({ stage, attempted: result.attempted }, 'Round produced no summaries, keeping previous set');
    }

    rounds.push({
      stage,
      successful: result.successful,
      attempted: result.attempted,
      inputTokens: totalTokens(previous),
      outputTokens: totalTokens(next),
    });

    return next;
  }

  private buildReport(units: readonly SummaryUnit[]): TokenReport {
    const total = totalTokens(units);
    return {
      totalTokens: total,
      targetTokens: this.config.targetTokens,
      metTarget: total <= this.config.targetTokens,
    };
  }

  private checkAborted(signal: AbortSignal | undefined, boundary: string): void {
    if (signal?.aborted) {
      throw new PipelineAbortedError(boundary);
    }
  }
}
