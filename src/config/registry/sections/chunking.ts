/**
 * Chunking Configuration Section
 *
 * Token bounds used when packing sections into chunks.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const chunkingSection: ConfigSectionMeta = {
  name: 'chunking',
  description: 'Section packing configuration.',
  options: {
    maxTokens: {
      envKey: 'DOCSQUEEZE_CHUNK_MAX_TOKENS',
      defaultValue: 16000,
      description: 'Maximum tokens per chunk (chunk granularity, not the final budget).',
      schema: z.number().int().min(1),
      parse: 'int',
    },
    formatOverhead: {
      envKey: 'DOCSQUEEZE_CHUNK_FORMAT_OVERHEAD',
      defaultValue: 50,
      description: 'Tokens reserved per section for header markup added at serialization.',
      schema: z.number().int().min(0),
      parse: 'int',
    },
    splitReserve: {
      envKey: 'DOCSQUEEZE_CHUNK_SPLIT_RESERVE',
      defaultValue: 100,
      description: 'Safety margin subtracted from maxTokens when splitting an oversized section.',
      schema: z.number().int().min(0),
      parse: 'int',
    },
  },
};
