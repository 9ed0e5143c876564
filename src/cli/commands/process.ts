/**
 * Process CLI Command
 *
 * Split documentation files into token-bounded chunks.
 */

import { Command } from 'commander';
import { z } from 'zod';
import { getCliContext, shutdownCliContext } from '../utils/context.js';
import { formatOutput } from '../utils/output.js';
import { handleCliError } from '../utils/errors.js';
import { parsePositiveInt } from '../utils/parsers.js';
import { typedAction } from '../utils/typed-action.js';

const ProcessOptionsSchema = z.object({
  maxTokens: z.number().int().positive().optional(),
});

export function addProcessCommand(program: Command): void {
  program
    .command('process')
    .description('Split documentation files into token-bounded chunks')
    .option('--max-tokens <n>', 'Maximum tokens per chunk', parsePositiveInt)
    .action(
      typedAction(ProcessOptionsSchema, async (options, globalOpts) => {
        try {
          const { pipeline } = getCliContext({ chunkMaxTokens: options.maxTokens });
          const result = await pipeline.processDocuments();
          if (!globalOpts.quiet) {
            console.log(formatOutput(result, globalOpts.format));
          }
        } catch (error) {
          handleCliError(error);
        } finally {
          shutdownCliContext();
        }
      })
    );
}
