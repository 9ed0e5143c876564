/**
 * Tokenizer Configuration Section
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const tokenizerSection: ConfigSectionMeta = {
  name: 'tokenizer',
  description: 'Token counting configuration.',
  options: {
    encoding: {
      envKey: 'DOCSQUEEZE_TOKENIZER',
      defaultValue: 'cl100k_base',
      description:
        'Tokenizer used for every count in a run: cl100k_base, o200k_base, or estimate (~4 chars per token).',
      schema: z.enum(['cl100k_base', 'o200k_base', 'estimate']),
      allowedValues: ['cl100k_base', 'o200k_base', 'estimate'],
    },
  },
};
