/**
 * Paths Configuration Section
 *
 * Pipeline directory layout. Relative paths resolve against the data dir.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';
import { getDataDir } from '../parsers.js';

export const pathsSection: ConfigSectionMeta = {
  name: 'paths',
  description: 'Directory path configuration.',
  options: {
    dataDir: {
      envKey: 'DOCSQUEEZE_DATA_DIR',
      defaultValue: '.',
      description: 'Base data directory. Supports ~ expansion. Defaults to the working directory.',
      schema: z.string(),
      parse: () => getDataDir(),
    },
    input: {
      envKey: 'DOCSQUEEZE_INPUT_DIR',
      defaultValue: 'documentation',
      description: 'Directory holding the fetched .txt documents.',
      schema: z.string(),
      parse: 'path',
    },
    chunks: {
      envKey: 'DOCSQUEEZE_CHUNKS_DIR',
      defaultValue: 'chunks',
      description: 'Directory for packed chunk files.',
      schema: z.string(),
      parse: 'path',
    },
    summaries: {
      envKey: 'DOCSQUEEZE_SUMMARIES_DIR',
      defaultValue: 'summaries',
      description: 'Directory for summaries, optimized summaries and combined documents.',
      schema: z.string(),
      parse: 'path',
    },
  },
};
