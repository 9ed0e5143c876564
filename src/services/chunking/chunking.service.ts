/**
 * Chunking Service
 *
 * Turns a source document into token-bounded chunks: section extraction
 * followed by packing. All counts come from the injected tokenizer.
 */

import type { Tokenizer } from '../tokenizer/index.js';
import { createComponentLogger } from '../../utils/logger.js';
import { ChunkPacker } from './chunk-packer.js';
import { SectionExtractor } from './section-extractor.js';
import {
  DEFAULT_CHUNKING_CONFIG,
  type Chunk,
  type ChunkingConfig,
  type ChunkingResult,
  type ChunkingStats,
  type Section,
  type SourceDocument,
} from './types.js';

const logger = createComponentLogger('chunking');

/**
 * Service for chunking documents under a token ceiling
 */
export class ChunkingService {
  private config: ChunkingConfig;
  private readonly extractor: SectionExtractor;

  constructor(
    private readonly tokenizer: Tokenizer,
    config: Partial<ChunkingConfig> = {}
  ) {
    this.config = { ...DEFAULT_CHUNKING_CONFIG, ...config };
    this.extractor = new SectionExtractor(tokenizer);
  }

  /**
   * Get current configuration
   */
  getConfig(): ChunkingConfig {
    return { ...this.config };
  }

  extractSections(text: string, documentId: string): Section[] {
    return this.extractor.extract(text, documentId);
  }

  pack(sections: readonly Section[], source: string, config?: Partial<ChunkingConfig>): Chunk[] {
    return new ChunkPacker(this.tokenizer, { ...this.config, ...config }).pack(sections, source);
  }

  /**
   * Chunk a parsed document
   */
  chunk(document: SourceDocument, config?: Partial<ChunkingConfig>): ChunkingResult {
    const startTime = Date.now();

    const sections = this.extractSections(document.text, document.id);
    const chunks = this.pack(sections, document.id, config);
    const stats = this.calculateStats(sections, chunks, startTime);

    logger.debug(
      { source: document.id, sections: stats.totalSections, chunks: stats.totalChunks },
      'Document chunked'
    );

    return {
      sourceId: document.id,
      ...(document.url ? { url: document.url } : {}),
      sections,
      chunks,
      stats,
    };
  }

  private calculateStats(sections: Section[], chunks: Chunk[], startTime: number): ChunkingStats {
    const tokens = chunks.map((c) => c.tokenCount);
    const total = tokens.reduce((sum, t) => sum + t, 0);

    return {
      totalSections: sections.length,
      totalChunks: chunks.length,
      continuationChunks: chunks.filter((c) => c.continuation).length,
      avgChunkTokens: chunks.length > 0 ? Math.round(total / chunks.length) : 0,
      minChunkTokens: tokens.length > 0 ? Math.min(...tokens) : 0,
      maxChunkTokens: tokens.length > 0 ? Math.max(...tokens) : 0,
      processingTimeMs: Date.now() - startTime,
    };
  }
}

/**
 * Create a chunking service instance
 */
export function createChunkingService(
  tokenizer: Tokenizer,
  config?: Partial<ChunkingConfig>
): ChunkingService {
  return new ChunkingService(tokenizer, config);
}
