/**
 * Summarizer Module
 *
 * Stage-aware text summarization over LLM providers
 */

export { LLMSummarizer, createSummarizer, getDefaultModel } from './llm-summarizer.js';
export { buildPrompts, getFallbackSummary, splitSentences, FALLBACK_KEEP_RATIO } from './prompts.js';
export * from './types.js';
