/**
 * Chunking Module
 *
 * Section extraction and token-bounded chunk packing
 */

export * from './types.js';
export { ChunkingService, createChunkingService } from './chunking.service.js';
export { ChunkPacker, renderSections } from './chunk-packer.js';
export { SectionExtractor, matchHeader } from './section-extractor.js';
export { normalizeChunkText } from './text-normalizer.js';
export { parseSourceDocument, documentIdFromFileName } from './source-document.js';
