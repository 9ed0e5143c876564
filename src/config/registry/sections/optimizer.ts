/**
 * Optimizer Configuration Section
 *
 * Final document budget and the batch-reduction tuning constants.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const optimizerSection: ConfigSectionMeta = {
  name: 'optimizer',
  description: 'Summary reduction configuration.',
  options: {
    targetTokens: {
      envKey: 'DOCSQUEEZE_TARGET_TOKENS',
      defaultValue: 32000,
      description: 'Token budget for the final combined document.',
      schema: z.number().int().min(1),
      parse: 'int',
    },
    maxStages: {
      envKey: 'DOCSQUEEZE_OPTIMIZER_MAX_STAGES',
      defaultValue: 3,
      description: 'Compression stage ceiling, counting the first pass (normal, aggressive, extreme).',
      schema: z.number().int().min(1).max(3),
      parse: 'int',
    },
    batchSlack: {
      envKey: 'DOCSQUEEZE_OPTIMIZER_BATCH_SLACK',
      defaultValue: 1.2,
      description: 'A batch closes when it would exceed the ideal batch size times this factor.',
      schema: z.number().min(1),
    },
    topicSplitFloor: {
      envKey: 'DOCSQUEEZE_OPTIMIZER_TOPIC_SPLIT_FLOOR',
      defaultValue: 0.5,
      description:
        'A topic change only closes a batch holding at least this fraction of the ideal batch size.',
      schema: z.number().min(0).max(1),
    },
  },
};
