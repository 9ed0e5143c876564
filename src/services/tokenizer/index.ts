export {
  TiktokenTokenizer,
  EstimateTokenizer,
  createTokenizer,
  CHARS_PER_TOKEN,
} from './tokenizer.js';
export type { Tokenizer } from './tokenizer.js';
