/**
 * Chunking System Types
 *
 * Types for section extraction and token-bounded chunk packing
 */

/**
 * A raw document handed over by the fetch stage
 */
export interface SourceDocument {
  /** Document identifier (file name without extension) */
  id: string;
  /** File name the document was read from */
  fileName: string;
  /** Source URL from the `URL:` header line, when present */
  url?: string;
  /** Token count declared by the fetch stage, when present */
  declaredTokenCount?: number;
  /** Document body with the metadata header removed */
  text: string;
}

/**
 * One heading-delimited block of a document
 */
export interface Section {
  title: string;
  content: string;
  /** Header depth (1 = top-level). Display only. */
  level: number;
  tokenCount: number;
}

/**
 * A token-bounded unit of text handed to the summarizer
 */
export interface Chunk {
  id: string;
  /** Serialized, normalized text */
  text: string;
  /** Originating document identifier */
  source: string;
  /** Tokenizer count of `text` */
  tokenCount: number;
  /** Position within the source's chunk sequence */
  index: number;
  /** Titles of the sections packed into this chunk, in order */
  sectionTitles: string[];
  /** True for fragments of an oversized section */
  continuation: boolean;
}

/**
 * Chunking statistics
 */
export interface ChunkingStats {
  totalSections: number;
  totalChunks: number;
  /** Chunks produced by splitting oversized sections */
  continuationChunks: number;
  avgChunkTokens: number;
  minChunkTokens: number;
  maxChunkTokens: number;
  processingTimeMs: number;
}

/**
 * Result of chunking a document
 */
export interface ChunkingResult {
  sourceId: string;
  url?: string;
  sections: Section[];
  chunks: Chunk[];
  stats: ChunkingStats;
}

/**
 * Configuration for packing
 */
export interface ChunkingConfig {
  /** Maximum tokens per chunk */
  maxTokens: number;
  /** Tokens reserved per section for header markup added at serialization */
  formatOverhead: number;
  /** Margin subtracted from maxTokens when splitting an oversized section by words */
  splitReserve: number;
}

/**
 * Default chunking configuration
 */
export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  maxTokens: 16000,
  formatOverhead: 50,
  splitReserve: 100,
};
