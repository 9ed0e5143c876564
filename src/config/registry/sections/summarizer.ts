/**
 * Summarizer Configuration Section
 *
 * Text-generation provider used to summarize chunks and batches.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';
import { getSummarizerProvider } from '../parsers.js';

export const summarizerSection: ConfigSectionMeta = {
  name: 'summarizer',
  description: 'Summarization provider configuration.',
  options: {
    provider: {
      envKey: 'DOCSQUEEZE_SUMMARIZER_PROVIDER',
      defaultValue: 'disabled',
      description:
        'Summarization provider: openai, anthropic, ollama, or disabled (extractive fallback).',
      schema: z.enum(['openai', 'anthropic', 'ollama', 'disabled']),
      // Auto-detected from API keys when unset
      parse: () => getSummarizerProvider(),
    },
    model: {
      envKey: 'DOCSQUEEZE_SUMMARIZER_MODEL',
      defaultValue: undefined,
      description: 'Model override. Defaults depend on the provider.',
      schema: z.string().optional(),
    },
    openaiApiKey: {
      envKey: 'OPENAI_API_KEY',
      defaultValue: undefined,
      description: 'OpenAI API key.',
      schema: z.string().optional(),
      sensitive: true,
    },
    openaiBaseUrl: {
      envKey: 'DOCSQUEEZE_OPENAI_BASE_URL',
      defaultValue: undefined,
      description: 'Base URL for OpenAI-compatible endpoints.',
      schema: z.string().optional(),
    },
    anthropicApiKey: {
      envKey: 'ANTHROPIC_API_KEY',
      defaultValue: undefined,
      description: 'Anthropic API key.',
      schema: z.string().optional(),
      sensitive: true,
    },
    ollamaBaseUrl: {
      envKey: 'DOCSQUEEZE_OLLAMA_BASE_URL',
      defaultValue: 'http://localhost:11434',
      description: 'Base URL for a local Ollama server.',
      schema: z.string(),
    },
    temperature: {
      envKey: 'DOCSQUEEZE_SUMMARIZER_TEMPERATURE',
      defaultValue: 0.3,
      description: 'Sampling temperature (0-1).',
      schema: z.number().min(0).max(2),
    },
    maxOutputTokens: {
      envKey: 'DOCSQUEEZE_SUMMARIZER_MAX_OUTPUT_TOKENS',
      defaultValue: 16000,
      description: 'Maximum tokens the provider may generate per call.',
      schema: z.number().int().min(1),
      parse: 'int',
    },
    timeoutMs: {
      envKey: 'DOCSQUEEZE_SUMMARIZER_TIMEOUT_MS',
      defaultValue: 120000,
      description: 'Timeout for a single summarization call; a timeout drops the unit.',
      schema: z.number().int().min(1),
      parse: 'int',
    },
    concurrency: {
      envKey: 'DOCSQUEEZE_SUMMARIZER_CONCURRENCY',
      defaultValue: 2,
      description: 'Maximum summarization calls in flight.',
      schema: z.number().int().min(1),
      parse: 'int',
    },
  },
};
