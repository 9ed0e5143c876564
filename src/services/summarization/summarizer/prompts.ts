/**
 * Stage-aware prompts for documentation summarization
 *
 * Each stage compresses harder than the previous one. The extractive fallback
 * mirrors that by keeping a shrinking share of sentences.
 */

import type { CompressionStage, StagePrompt } from './types.js';

// =============================================================================
// SYSTEM PROMPTS
// =============================================================================

const NORMAL_SYSTEM_PROMPT = `You are a technical documentation expert. Summarize the following text into clear, concise documentation format. Focus on key concepts, functionality, and important details. Remove any unnecessary verbosity while maintaining technical accuracy. Prioritize information about usage and configuration over explanations.`;

const AGGRESSIVE_SYSTEM_PROMPT = `You are a technical documentation expert focused on extreme summarization. Create a highly optimized summary that preserves essential information while being as concise as possible. Focus ONLY on:
1. Key functionality and usage
2. Critical parameters and configurations
3. Essential technical details
Remove ALL:
- Explanatory text that isn't crucial
- Redundant information
- Verbose descriptions
- Non-essential examples
Every word must justify its existence.`;

const EXTREME_SYSTEM_PROMPT = `You are a technical documentation expert tasked with EXTREME summarization. Your goal is to create an ultra-compact summary that ONLY includes:
1. Core functionality and usage patterns
2. Critical API endpoints and parameters
3. Essential configuration options
AGGRESSIVELY remove:
- All explanatory text that isn't absolutely necessary
- Background information
- Implementation details
- Examples unless they're the only way to convey usage
- Any word that can be removed without losing core meaning
Be ruthless in condensing - every single character counts.`;

const SYSTEM_PROMPTS: Record<CompressionStage, string> = {
  normal: NORMAL_SYSTEM_PROMPT,
  aggressive: AGGRESSIVE_SYSTEM_PROMPT,
  extreme: EXTREME_SYSTEM_PROMPT,
};

const USER_PREFIX =
  'Create an extremely concise summary. Focus on usage, parameters, and configuration. ' +
  'Remove all unnecessary words. The summary must be as short as possible while retaining ' +
  'critical technical information.\n\n';

/**
 * Build the system and user prompts for a stage
 */
export function buildPrompts(stage: CompressionStage, text: string): StagePrompt {
  return {
    systemPrompt: SYSTEM_PROMPTS[stage],
    userPrompt: USER_PREFIX + text,
  };
}

// =============================================================================
// FALLBACK
// =============================================================================

/** Share of sentences kept by the extractive fallback */
export const FALLBACK_KEEP_RATIO: Record<CompressionStage, number> = {
  normal: 0.5,
  aggressive: 0.3,
  extreme: 0.15,
};

/**
 * Split text into sentences. Header lines and batch separators are dropped.
 */
export function splitSentences(text: string): string[] {
  const body = text
    .split(/\r?\n/)
    .filter((line) => !/^#{1,6}\s/.test(line) && line.trim() !== '---')
    .join(' ')
    .replace(/\s+/g, ' ')
    .trim();

  if (!body) return [];
  return body.split(/(?<=[.!?])\s+/).filter((s) => s.length > 0);
}

/**
 * Extractive summary used when no LLM provider is configured.
 * Keeps the leading sentences, at least one.
 */
export function getFallbackSummary(text: string, stage: CompressionStage): string | null {
  const sentences = splitSentences(text);
  if (sentences.length === 0) {
    return null;
  }

  const keep = Math.max(1, Math.ceil(sentences.length * FALLBACK_KEEP_RATIO[stage]));
  return sentences.slice(0, keep).join(' ');
}
