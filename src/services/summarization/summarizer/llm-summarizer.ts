/**
 * LLM Summarizer
 *
 * Stage-aware documentation summarization over OpenAI, Anthropic or Ollama,
 * with an extractive fallback when the provider is disabled.
 */

import { OpenAI } from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { createComponentLogger } from '../../../utils/logger.js';
import { withRetry, isRetryableNetworkError } from '../../../utils/retry.js';
import {
  createValidationError,
  createSizeLimitError,
  createServiceUnavailableError,
  createEmptySummaryError,
} from '../../../core/errors.js';
import type { Config } from '../../../config/index.js';
import {
  DEFAULT_SUMMARIZER_CONFIG,
  type CompressionStage,
  type LLMProvider,
  type SummarizerConfig,
  type TextSummarizer,
} from './types.js';
import { buildPrompts, getFallbackSummary } from './prompts.js';

const logger = createComponentLogger('summarizer');

/** Upper bound on prompt size sent to a provider */
const MAX_CONTEXT_LENGTH = 1_000_000;

const OllamaResponseSchema = z.object({ response: z.string() });

/**
 * Validate model name to prevent injection attacks
 */
function isValidModelName(modelName: string): boolean {
  const validPattern = /^[a-zA-Z0-9._:-]+$/;
  return validPattern.test(modelName) && modelName.length <= 100;
}

/**
 * Default model per provider
 */
export function getDefaultModel(provider: LLMProvider): string {
  switch (provider) {
    case 'openai':
      return 'gpt-4o-mini';
    case 'anthropic':
      return 'claude-3-5-haiku-20241022';
    case 'ollama':
      return 'llama3.2';
    case 'disabled':
      return 'none';
  }
}

type ResolvedSummarizerConfig = typeof DEFAULT_SUMMARIZER_CONFIG & {
  model: string;
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  anthropicApiKey?: string;
};

/**
 * @example
 * ```typescript
 * const summarizer = new LLMSummarizer({
 *   provider: 'openai',
 *   openaiApiKey: process.env.OPENAI_API_KEY,
 * });
 * const summary = await summarizer.summarize(chunkText, 'normal');
 * ```
 */
export class LLMSummarizer implements TextSummarizer {
  private config: ResolvedSummarizerConfig;
  private openaiClient: OpenAI | null = null;
  private anthropicClient: Anthropic | null = null;

  constructor(config: SummarizerConfig) {
    this.config = {
      ...DEFAULT_SUMMARIZER_CONFIG,
      ...config,
      model: config.model || getDefaultModel(config.provider),
    };

    if (!isValidModelName(this.config.model)) {
      throw createValidationError(
        'model',
        `invalid model name "${this.config.model}"`,
        'Model names must only contain alphanumeric characters, hyphens, underscores, colons, and dots'
      );
    }

    this.initializeClients();

    logger.debug(
      { provider: this.config.provider, model: this.config.model },
      'LLM summarizer initialized'
    );
  }

  private initializeClients(): void {
    switch (this.config.provider) {
      case 'openai':
        if (!this.config.openaiApiKey) {
          throw createValidationError(
            'openaiApiKey',
            'is required when provider is "openai"',
            'Set OPENAI_API_KEY or use a different provider'
          );
        }
        this.openaiClient = new OpenAI({
          apiKey: this.config.openaiApiKey,
          baseURL: this.config.openaiBaseUrl,
          timeout: this.config.requestTimeoutMs,
          maxRetries: 0, // retries go through withRetry
        });
        break;

      case 'anthropic':
        if (!this.config.anthropicApiKey) {
          throw createValidationError(
            'anthropicApiKey',
            'is required when provider is "anthropic"',
            'Set ANTHROPIC_API_KEY or use a different provider'
          );
        }
        this.anthropicClient = new Anthropic({
          apiKey: this.config.anthropicApiKey,
          timeout: this.config.requestTimeoutMs,
          maxRetries: 0,
        });
        break;

      case 'ollama':
      case 'disabled':
        break;
    }
  }

  isAvailable(): boolean {
    return this.config.provider !== 'disabled';
  }

  getProvider(): LLMProvider {
    return this.config.provider;
  }

  getModel(): string {
    return this.config.model;
  }

  /**
   * Summarize text at the given compression stage.
   *
   * Provider failures propagate after retries; the caller decides whether a
   * failed unit is dropped.
   */
  async summarize(
    text: string,
    stage: CompressionStage,
    signal?: AbortSignal
  ): Promise<string | null> {
    if (!text.trim()) {
      throw createValidationError('text', 'cannot be empty for summarization');
    }

    const provider = this.config.provider;
    if (provider === 'disabled') {
      return getFallbackSummary(text, stage);
    }

    const { systemPrompt, userPrompt } = buildPrompts(stage, text);
    const totalLength = systemPrompt.length + userPrompt.length;
    if (totalLength > MAX_CONTEXT_LENGTH) {
      throw createSizeLimitError('context', MAX_CONTEXT_LENGTH, totalLength, 'characters');
    }

    const startTime = Date.now();
    const summary = await this.callProvider(provider, systemPrompt, userPrompt, signal);

    logger.debug(
      {
        stage,
        provider,
        inputChars: text.length,
        outputChars: summary.length,
        processingTimeMs: Date.now() - startTime,
      },
      'Summarization completed'
    );

    return summary.trim() || null;
  }

  private callProvider(
    provider: Exclude<LLMProvider, 'disabled'>,
    systemPrompt: string,
    userPrompt: string,
    signal?: AbortSignal
  ): Promise<string> {
    switch (provider) {
      case 'openai':
        return this.summarizeOpenAI(systemPrompt, userPrompt, signal);
      case 'anthropic':
        return this.summarizeAnthropic(systemPrompt, userPrompt, signal);
      case 'ollama':
        return this.summarizeOllama(systemPrompt, userPrompt, signal);
    }
  }

  private async summarizeOpenAI(
    systemPrompt: string,
    userPrompt: string,
    signal?: AbortSignal
  ): Promise<string> {
    const client = this.openaiClient;
    if (!client) {
      throw createServiceUnavailableError('OpenAI', 'client not initialized');
    }

    return withRetry(
      async () => {
        const response = await client.chat.completions.create(
          {
            model: this.config.model,
            messages: [
              { role: 'system', content: systemPrompt },
              { role: 'user', content: userPrompt },
            ],
            temperature: this.config.temperature,
            max_tokens: this.config.maxOutputTokens,
          },
          { signal }
        );

        const content = response.choices[0]?.message?.content;
        if (!content) {
          throw createEmptySummaryError('openai');
        }
        return content;
      },
      {
        retryableErrors: isRetryableNetworkError,
        signal,
        onRetry: (error, attempt) => {
          logger.warn({ error: error.message, attempt }, 'Retrying OpenAI summarization');
        },
      }
    );
  }

  private async summarizeAnthropic(
    systemPrompt: string,
    userPrompt: string,
    signal?: AbortSignal
  ): Promise<string> {
    const client = this.anthropicClient;
    if (!client) {
      throw createServiceUnavailableError('Anthropic', 'client not initialized');
    }

    return withRetry(
      async () => {
        const response = await client.messages.create(
          {
            model: this.config.model,
            max_tokens: this.config.maxOutputTokens,
            temperature: this.config.temperature,
            system: systemPrompt,
            messages: [{ role: 'user', content: userPrompt }],
          },
          { signal }
        );

        const textBlock = response.content.find((block) => block.type === 'text');
        if (!textBlock || textBlock.type !== 'text') {
          throw createEmptySummaryError('anthropic');
        }
        return textBlock.text;
      },
      {
        retryableErrors: isRetryableNetworkError,
        signal,
        onRetry: (error, attempt) => {
          logger.warn({ error: error.message, attempt }, 'Retrying Anthropic summarization');
        },
      }
    );
  }

  private async summarizeOllama(
    systemPrompt: string,
    userPrompt: string,
    signal?: AbortSignal
  ): Promise<string> {
    const url = `${this.config.ollamaBaseUrl}/api/generate`;

    return withRetry(
      async () => {
        const response = await fetch(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          signal,
          body: JSON.stringify({
            model: this.config.model,
            system: systemPrompt,
            prompt: userPrompt,
            stream: false,
            options: {
              temperature: this.config.temperature,
              num_predict: this.config.maxOutputTokens,
            },
          }),
        });

        if (!response.ok) {
          throw createServiceUnavailableError(
            'Ollama',
            `request failed: ${response.status} ${response.statusText}`
          );
        }

        const parsed = OllamaResponseSchema.safeParse(await response.json());
        if (!parsed.success || !parsed.data.response) {
          throw createEmptySummaryError('ollama');
        }
        return parsed.data.response;
      },
      {
        retryableErrors: (error: Error) =>
          error.message.includes('ECONNREFUSED') ||
          error.message.includes('fetch failed') ||
          error.message.includes('network'),
        signal,
        onRetry: (error, attempt) => {
          logger.warn({ error: error.message, attempt }, 'Retrying Ollama summarization');
        },
      }
    );
  }
}

/**
 * Create a summarizer from the summarizer config section
 */
export function createSummarizer(settings: Config['summarizer']): LLMSummarizer {
  return new LLMSummarizer({
    provider: settings.provider,
    model: settings.model,
    openaiApiKey: settings.openaiApiKey,
    openaiBaseUrl: settings.openaiBaseUrl,
    anthropicApiKey: settings.anthropicApiKey,
    ollamaBaseUrl: settings.ollamaBaseUrl,
    maxOutputTokens: settings.maxOutputTokens,
    temperature: settings.temperature,
    requestTimeoutMs: settings.timeoutMs,
  });
}
