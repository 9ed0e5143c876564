/**
 * Pipeline Service
 *
 * Sequences the stages: process (chunk documents) -> summarize (first stage
 * plus reduction when over budget) -> combine. One instance owns its
 * tokenizer, storage and summarization driver for the duration of a run.
 */

import { PipelineAbortedError } from '../../core/errors.js';
import type { Config } from '../../config/index.js';
import { createComponentLogger } from '../../utils/logger.js';
import { ChunkingService } from '../chunking/chunking.service.js';
import { documentIdFromFileName, parseSourceDocument } from '../chunking/source-document.js';
import {
  COMBINED_HEADING,
  OPTIMIZED_COMBINED_HEADING,
  combine,
  titleFromFileName,
} from '../combiner/index.js';
import {
  PipelineStorage,
  summaryKeyForChunkFile,
  type StoredChunk,
  type StoredSummary,
} from '../storage/index.js';
import { BatchOptimizer } from '../summarization/batch-optimizer.js';
import { SummarizationDriver } from '../summarization/summarization-driver.js';
import { createSummarizer } from '../summarization/summarizer/llm-summarizer.js';
import type { SummaryTask, SummaryUnit, TokenReport } from '../summarization/types.js';
import { createTokenizer, type Tokenizer } from '../tokenizer/index.js';
import type {
  CombinedOutput,
  CombineReport,
  DocumentReport,
  PipelineDependencies,
  PipelineSettings,
  ProcessReport,
  RunReport,
  SummarizeOptions,
  SummarizeReport,
} from './types.js';

const logger = createComponentLogger('pipeline');

export class PipelineService {
  private readonly tokenizer: Tokenizer;
  private readonly storage: PipelineStorage;
  private readonly chunking: ChunkingService;
  private readonly driver: SummarizationDriver;
  private readonly optimizer: BatchOptimizer;

  constructor(
    private readonly settings: PipelineSettings,
    deps: PipelineDependencies
  ) {
    this.tokenizer = deps.tokenizer;
    this.storage = new PipelineStorage(settings.paths);
    this.chunking = new ChunkingService(deps.tokenizer, settings.chunking);
    this.driver = new SummarizationDriver(deps.summarizer, deps.tokenizer, settings.driver);
    this.optimizer = new BatchOptimizer(this.driver, settings.optimizer, deps.topicBoundary);
  }

  /**
   * Chunk every input document. A failing document is logged and counted;
   * the others continue.
   */
  async processDocuments(): Promise<ProcessReport> {
    const files = await this.storage.listInputFiles();
    if (files.length === 0) {
      logger.warn({ dir: this.settings.paths.input }, 'No .txt files found');
    }

    const documents: DocumentReport[] = [];
    for (const fileName of files) {
      documents.push(await this.processDocument(fileName));
    }

    const report: ProcessReport = {
      successful: documents.filter((d) => d.status === 'ok').length,
      attempted: documents.length,
      totalChunks: documents.reduce((sum, d) => sum + d.chunks, 0),
      documents,
    };

    logger.info(
      { successful: report.successful, attempted: report.attempted, chunks: report.totalChunks },
      'Documents processed'
    );
    return report;
  }

  private async processDocument(fileName: string): Promise<DocumentReport> {
    try {
      const document = parseSourceDocument(await this.storage.readInput(fileName), fileName);
      const result = this.chunking.chunk(document);
      const base = {
        id: document.id,
        fileName,
        ...(document.url ? { url: document.url } : {}),
      };

      if (result.chunks.length === 0) {
        logger.warn({ file: fileName }, 'No sections found');
        return { ...base, status: 'empty', chunks: 0 };
      }

      await this.storage.writeChunks(result.chunks, document.url);
      logger.debug({ file: fileName, chunks: result.chunks.length }, 'Chunks saved');
      return { ...base, status: 'ok', chunks: result.chunks.length };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ file: fileName, error: message }, 'Document processing failed');
      return {
        id: documentIdFromFileName(fileName),
        fileName,
        status: 'failed',
        chunks: 0,
        error: message,
      };
    }
  }

  /**
   * First-stage summaries for pending chunks, then reduction when the total
   * exceeds the target. Stale optimized output is cleared otherwise.
   */
  async summarizeChunks(options: SummarizeOptions = {}): Promise<SummarizeReport> {
    this.checkAborted(options.signal, 'summarize');

    const { tasks, skipped, unreadable } = await this.collectPendingTasks(options.force ?? false);
    if (tasks.length === 0 && unreadable === 0) {
      logger.info({ skipped }, 'No chunks to summarize');
    }

    const firstStage = await this.driver.summarizeAll(tasks, 'normal', async (unit) => {
      await this.storage.writeSummary(unit.outputKey, unit.content);
    });

    this.checkAborted(options.signal, 'optimization');

    const units = this.toUnits(await this.storage.listSummaries());
    const { targetTokens } = this.settings.optimizer;
    const total = units.reduce((sum, u) => sum + u.tokenCount, 0);

    const base = {
      skipped,
      firstStage: {
        stage: 'normal' as const,
        successful: firstStage.successful,
        // Unreadable chunks count as failed attempts
        attempted: firstStage.attempted + unreadable,
      },
    };

    if (total <= targetTokens) {
      logger.info({ totalTokens: total, targetTokens }, 'Summaries within limit');
      await this.storage.clearOptimized();
      return { ...base, report: this.tokenReport(total) };
    }

    logger.info({ totalTokens: total, targetTokens }, 'Optimizing summaries');
    const reduction = await this.optimizer.reduce(units, { signal: options.signal });

    if (reduction.rounds.some((round) => round.successful > 0)) {
      await this.storage.replaceOptimized(reduction.units);
    } else {
      logger.warn('Reduction produced no summaries, optimized output not written');
      await this.storage.clearOptimized();
    }

    return { ...base, reduction, report: reduction.report };
  }

  /**
   * Write the combined document and, when optimized units exist, the
   * optimized combined document.
   */
  async combineSummaries(): Promise<CombineReport> {
    const report: CombineReport = {};

    const combined = await this.combineInto(await this.storage.listSummaries(), false);
    if (combined) report.combined = combined;

    const optimized = await this.combineInto(await this.storage.listOptimizedSummaries(), true);
    if (optimized) report.optimized = optimized;

    return report;
  }

  /**
   * process -> summarize -> combine
   */
  async run(options: SummarizeOptions = {}): Promise<RunReport> {
    this.checkAborted(options.signal, 'process');
    const processReport = await this.processDocuments();

    const summarizeReport = await this.summarizeChunks(options);

    this.checkAborted(options.signal, 'combine');
    const combineReport = await this.combineSummaries();

    return { process: processReport, summarize: summarizeReport, combine: combineReport };
  }

  /**
   * Remove generated chunks and summaries
   */
  async clean(): Promise<string[]> {
    return this.storage.clean();
  }

  private async collectPendingTasks(
    force: boolean
  ): Promise<{ tasks: SummaryTask[]; skipped: number; unreadable: number }> {
    const files = await this.storage.listChunkFiles();
    const tasks: SummaryTask[] = [];
    let skipped = 0;
    let unreadable = 0;

    for (const [order, fileName] of files.entries()) {
      const key = summaryKeyForChunkFile(fileName);
      if (!force && (await this.storage.hasSummary(key))) {
        skipped++;
        continue;
      }

      let chunk: StoredChunk;
      try {
        chunk = await this.storage.readChunk(fileName);
      } catch (error) {
        logger.error(
          { file: fileName, error: error instanceof Error ? error.message : String(error) },
          'Unreadable chunk skipped'
        );
        unreadable++;
        continue;
      }

      tasks.push({
        id: key,
        title: titleFromFileName(key),
        content: chunk.text,
        outputKey: key,
        order,
      });
    }

    return { tasks, skipped, unreadable };
  }

  private async combineInto(
    summaries: StoredSummary[],
    optimized: boolean
  ): Promise<CombinedOutput | undefined> {
    const units = this.toUnits(summaries);
    const heading = optimized ? OPTIMIZED_COMBINED_HEADING : COMBINED_HEADING;
    const result = combine(units, heading);

    if (result.status === 'empty') {
      if (!optimized) {
        logger.warn({ reason: result.reason }, 'No summaries found to combine');
      }
      return undefined;
    }

    const path = await this.storage.writeCombined(result.text, optimized);
    const output: CombinedOutput = {
      path,
      unitCount: result.unitCount,
      report: this.tokenReport(this.tokenizer.count(result.text)),
    };

    logger.info({ path, ...output.report }, optimized ? 'Optimized summary combined' : 'Summary combined');
    return output;
  }

  private toUnits(summaries: StoredSummary[]): SummaryUnit[] {
    return summaries.map((summary, order) => ({
      id: summary.key,
      title: titleFromFileName(summary.fileName),
      content: summary.content,
      outputKey: summary.key,
      order,
      tokenCount: this.tokenizer.count(summary.content),
    }));
  }

  private tokenReport(totalTokens: number): TokenReport {
    const { targetTokens } = this.settings.optimizer;
    return { totalTokens, targetTokens, metTarget: totalTokens <= targetTokens };
  }

  private checkAborted(signal: AbortSignal | undefined, boundary: string): void {
    if (signal?.aborted) {
      throw new PipelineAbortedError(boundary);
    }
  }
}

/**
 * Build a pipeline from application config. Tokenizer and summarizer may be
 * overridden.
 */
export function createPipelineService(
  appConfig: Config,
  overrides: Partial<PipelineDependencies> = {}
): PipelineService {
  const settings: PipelineSettings = {
    paths: {
      input: appConfig.paths.input,
      chunks: appConfig.paths.chunks,
      summaries: appConfig.paths.summaries,
    },
    chunking: { ...appConfig.chunking },
    driver: {
      concurrency: appConfig.summarizer.concurrency,
      timeoutMs: appConfig.summarizer.timeoutMs,
    },
    optimizer: { ...appConfig.optimizer },
  };

  return new PipelineService(settings, {
    tokenizer: overrides.tokenizer ?? createTokenizer(appConfig.tokenizer.encoding),
    summarizer: overrides.summarizer ?? createSummarizer(appConfig.summarizer),
    ...(overrides.topicBoundary ? { topicBoundary: overrides.topicBoundary } : {}),
  });
}
