/**
 * Chunk text normalization
 */

const FILLER_PHRASES = [
  'as mentioned earlier',
  'as discussed above',
  'as we can see',
  'it is worth noting that',
  'it should be noted that',
  'it is important to note that',
] as const;

const FILLER_PATTERN = new RegExp(FILLER_PHRASES.join('|'), 'gi');

/**
 * Collapse whitespace and repeated terminal punctuation, and drop filler phrases.
 */
export function normalizeChunkText(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .replace(/([.!?])\1+/g, '$1')
    .replace(FILLER_PATTERN, '')
    .replace(/\s+/g, ' ')
    .trim();
}
