/**
 * Tokenizers
 *
 * The single cost oracle of a pipeline run. Every stage of one run must
 * count with the same instance.
 */

import { getEncoding, type Tiktoken } from 'js-tiktoken';
import type { TokenizerEncoding } from '../../config/index.js';

/**
 * Tokens per character estimate (rough average for English prose)
 */
export const CHARS_PER_TOKEN = 4;

export interface Tokenizer {
  /** Encoding name, for logs and reports */
  readonly name: string;
  /** Deterministic, non-negative token count of text */
  count(text: string): number;
}

/**
 * BPE tokenizer backed by js-tiktoken
 */
export class TiktokenTokenizer implements Tokenizer {
  readonly name: string;
  private readonly encoder: Tiktoken;

  constructor(encoding: Exclude<TokenizerEncoding, 'estimate'> = 'cl100k_base') {
    this.name = encoding;
    this.encoder = getEncoding(encoding);
  }

  count(text: string): number {
    if (!text) return 0;
    // Special-token markers in scraped text are counted as plain text
    return this.encoder.encode(text, [], []).length;
  }
}

/**
 * Character-ratio estimate, for runs without a BPE vocabulary
 */
export class EstimateTokenizer implements Tokenizer {
  readonly name = 'estimate';

  count(text: string): number {
    if (!text) return 0;
    return Math.ceil(text.length / CHARS_PER_TOKEN);
  }
}

export function createTokenizer(encoding: TokenizerEncoding): Tokenizer {
  if (encoding === 'estimate') {
    return new EstimateTokenizer();
  }
  return new TiktokenTokenizer(encoding);
}
