/**
 * Clean CLI Command
 *
 * Remove generated chunks and summaries. Input documents are kept.
 */

import { Command } from 'commander';
import { z } from 'zod';
import { getCliContext, shutdownCliContext } from '../utils/context.js';
import { formatOutput } from '../utils/output.js';
import { handleCliError } from '../utils/errors.js';
import { typedAction } from '../utils/typed-action.js';

export function addCleanCommand(program: Command): void {
  program
    .command('clean')
    .description('Remove generated chunks and summaries')
    .action(
      typedAction(z.object({}), async (_options, globalOpts) => {
        try {
          const { pipeline } = getCliContext();
          const removed = await pipeline.clean();
          if (!globalOpts.quiet) {
            console.log(formatOutput({ removed: removed.map((path) => ({ path })) }, globalOpts.format));
          }
        } catch (error) {
          handleCliError(error);
        } finally {
          shutdownCliContext();
        }
      })
    );
}
