/**
 * Combine CLI Command
 *
 * Write the combined (and optimized combined) summary documents.
 */

import { Command } from 'commander';
import { z } from 'zod';
import { getCliContext, shutdownCliContext } from '../utils/context.js';
import { formatOutput } from '../utils/output.js';
import { handleCliError } from '../utils/errors.js';
import { parsePositiveInt } from '../utils/parsers.js';
import { typedAction } from '../utils/typed-action.js';

const CombineOptionsSchema = z.object({
  tokenLimit: z.number().int().positive().optional(),
});

export function addCombineCommand(program: Command): void {
  program
    .command('combine')
    .description('Combine summaries into a single document')
    .option('--token-limit <n>', 'Target token count reported against', parsePositiveInt)
    .action(
      typedAction(CombineOptionsSchema, async (options, globalOpts) => {
        try {
          const { pipeline } = getCliContext({ targetTokens: options.tokenLimit });
          const result = await pipeline.combineSummaries();
          if (!result.combined) {
            console.error('No summaries found to combine');
          }
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
