/**
 * Pipeline Types
 */

import type { ChunkingConfig } from '../chunking/types.js';
import type { StoragePaths } from '../storage/index.js';
import type { Tokenizer } from '../tokenizer/index.js';
import type { TextSummarizer } from '../summarization/summarizer/types.js';
import type {
  DriverConfig,
  OptimizerConfig,
  ReductionResult,
  StageReport,
  TokenReport,
  TopicBoundary,
} from '../summarization/types.js';

export interface PipelineDependencies {
  tokenizer: Tokenizer;
  summarizer: TextSummarizer;
  /** Defaults to the first-word topic boundary */
  topicBoundary?: TopicBoundary;
}

export interface PipelineSettings {
  paths: StoragePaths;
  chunking: ChunkingConfig;
  driver: DriverConfig;
  optimizer: OptimizerConfig;
}

export interface PipelineRunOptions {
  /** Checked between stages and between reduction rounds */
  signal?: AbortSignal;
}

export type DocumentStatus = 'ok' | 'empty' | 'failed';

export interface DocumentReport {
  id: string;
  fileName: string;
  url?: string;
  status: DocumentStatus;
  chunks: number;
  error?: string;
}

export interface ProcessReport {
  successful: number;
  attempted: number;
  totalChunks: number;
  documents: DocumentReport[];
}

export interface SummarizeOptions extends PipelineRunOptions {
  /** Re-summarize chunks that already have a summary */
  force?: boolean;
}

export interface SummarizeReport {
  /** Chunks skipped because a summary already existed */
  skipped: number;
  firstStage: StageReport;
  /** Present when the first-stage total exceeded the target */
  reduction?: ReductionResult;
  /** Token report over the units combine will use */
  report: TokenReport;
}

export interface CombinedOutput {
  path: string;
  unitCount: number;
  report: TokenReport;
}

export interface CombineReport {
  combined?: CombinedOutput;
  optimized?: CombinedOutput;
}

export interface RunReport {
  process: ProcessReport;
  summarize: SummarizeReport;
  combine: CombineReport;
}
