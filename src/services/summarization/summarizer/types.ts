/**
 * Summarizer Types
 */

import type { SummarizerProviderName } from '../../../config/registry/parsers.js';

/**
 * Compression stages, weakest first.
 *
 * - normal: first pass over individual chunks
 * - aggressive: re-summarization of a batch of summaries
 * - extreme: terminal collapse of everything into one summary
 */
export type CompressionStage = 'normal' | 'aggressive' | 'extreme';

export const COMPRESSION_STAGES: readonly CompressionStage[] = [
  'normal',
  'aggressive',
  'extreme',
] as const;

export type LLMProvider = SummarizerProviderName;

/**
 * The summarization capability the pipeline depends on.
 *
 * Resolves to null (or an empty string) when no usable summary was produced.
 * Rejects on transport failures; callers treat both as a dropped unit.
 */
export interface TextSummarizer {
  summarize(text: string, stage: CompressionStage, signal?: AbortSignal): Promise<string | null>;
}

export interface StagePrompt {
  systemPrompt: string;
  userPrompt: string;
}

/**
 * Summarizer configuration
 */
export interface SummarizerConfig {
  provider: LLMProvider;
  /** Model name; defaults per provider */
  model?: string;
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  anthropicApiKey?: string;
  ollamaBaseUrl?: string;
  /** Maximum tokens in a generated summary */
  maxOutputTokens?: number;
  temperature?: number;
  /** Client-level request timeout in ms */
  requestTimeoutMs?: number;
}

export const DEFAULT_SUMMARIZER_CONFIG: Required<Omit<SummarizerConfig, 'model' | 'openaiApiKey' | 'openaiBaseUrl' | 'anthropicApiKey'>> = {
  provider: 'disabled',
  ollamaBaseUrl: 'http://localhost:11434',
  maxOutputTokens: 16000,
  temperature: 0.3,
  requestTimeoutMs: 120000,
};
