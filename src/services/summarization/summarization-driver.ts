/**
 * Summarization Driver
 *
 * Runs the summarization capability over independent tasks with bounded
 * concurrency and a per-call timeout. Best effort: a task that throws, times
 * out or yields nothing is logged and dropped, never retried here.
 */

import { Semaphore } from '../../utils/backpressure.js';
import { createComponentLogger } from '../../utils/logger.js';
import { TimeoutError, createEmptySummaryError } from '../../core/errors.js';
import type { Tokenizer } from '../tokenizer/index.js';
import type { CompressionStage, TextSummarizer } from './summarizer/types.js';
import {
  DEFAULT_DRIVER_CONFIG,
  type DriverConfig,
  type DriverResult,
  type PersistHook,
  type SummaryTask,
  type SummaryUnit,
  type TaskOutcome,
} from './types.js';

const logger = createComponentLogger('summarization-driver');

export class SummarizationDriver {
  private readonly config: DriverConfig;
  private readonly semaphore: Semaphore;

  constructor(
    private readonly summarizer: TextSummarizer,
    private readonly tokenizer: Tokenizer,
    config: Partial<DriverConfig> = {}
  ) {
    this.config = { ...DEFAULT_DRIVER_CONFIG, ...config };
    this.semaphore = new Semaphore({ maxConcurrent: this.config.concurrency, name: 'summarizer' });
  }

  getConfig(): DriverConfig {
    return { ...this.config };
  }

  /**
   * Summarize every task. Outcome slots follow task order regardless of
   * completion order.
   */
  async summarizeAll(
    tasks: readonly SummaryTask[],
    stage: CompressionStage,
    persist?: PersistHook
  ): Promise<DriverResult> {
    const outcomes: TaskOutcome[] = await Promise.all(
      tasks.map((task) => this.runTask(task, stage, persist))
    );

    const units: SummaryUnit[] = [];
    for (const outcome of outcomes) {
      if (outcome.status === 'ok') {
        units.push(outcome.unit);
      }
    }

    logger.info(
      { stage, successful: units.length, attempted: tasks.length },
      'Summarization stage finished'
    );

    return { outcomes, units, successful: units.length, attempted: tasks.length };
  }

  private async runTask(
    task: SummaryTask,
    stage: CompressionStage,
    persist?: PersistHook
  ): Promise<TaskOutcome> {
    try {
      const summary = (await this.callWithTimeout(task.content, stage))?.trim();
      if (!summary) {
        throw createEmptySummaryError(stage);
      }

      const unit: SummaryUnit = {
        ...task,
        content: summary,
        tokenCount: this.tokenizer.count(summary),
      };

      if (persist) {
        await persist(unit);
      }

      logger.debug({ task: task.id, stage, tokens: unit.tokenCount }, 'Task summarized');
      return { status: 'ok', unit };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn({ task: task.id, stage, error: reason }, 'Task dropped');
      return { status: 'failed', taskId: task.id, reason };
    }
  }

  /**
   * Race the call against the timeout. The clock starts once a permit is
   * held; the permit is released only when the provider call settles.
   */
  private async callWithTimeout(text: string, stage: CompressionStage): Promise<string | null> {
    const { timeoutMs } = this.config;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let expire: (error: Error) => void = () => {};

    const deadline = new Promise<never>((_, reject) => {
      expire = reject;
    });

    const call = this.semaphore.withPermit(() => {
      timer = setTimeout(() => {
        expire(new TimeoutError(`summarize:${stage}`, timeoutMs));
        controller.abort();
      }, timeoutMs);
      return this.summarizer.summarize(text, stage, controller.signal);
    });

    // A call that loses the race may still reject later
    void call.catch((error: unknown) => {
      if (controller.signal.aborted) {
        logger.debug(
          { stage, error: error instanceof Error ? error.message : String(error) },
          'Timed-out call settled with an error'
        );
      }
    });

    try {
      return await Promise.race([call, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}
