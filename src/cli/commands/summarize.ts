/**
 * Summarize CLI Command
 *
 * Summarize pending chunks, then reduce the summaries when they exceed the
 * token limit.
 */

import { Command } from 'commander';
import { z } from 'zod';
import { getCliContext, shutdownCliContext } from '../utils/context.js';
import { formatOutput } from '../utils/output.js';
import { handleCliError } from '../utils/errors.js';
import { parsePositiveInt } from '../utils/parsers.js';
import { typedAction } from '../utils/typed-action.js';

const SummarizeOptionsSchema = z.object({
  force: z.boolean().default(false),
  tokenLimit: z.number().int().positive().optional(),
  concurrency: z.number().int().positive().optional(),
});

export function addSummarizeCommand(program: Command): void {
  program
    .command('summarize')
    .description('Summarize chunks and optimize the result to fit the token limit')
    .option('--force', 'Re-summarize chunks that already have a summary', false)
    .option('--token-limit <n>', 'Target token count for the combined summary', parsePositiveInt)
    .option('--concurrency <n>', 'Maximum concurrent summarization calls', parsePositiveInt)
    .action(
      typedAction(SummarizeOptionsSchema, async (options, globalOpts) => {
        try {
          const { pipeline, signal } = getCliContext({
            targetTokens: options.tokenLimit,
            concurrency: options.concurrency,
          });
          const result = await pipeline.summarizeChunks({ force: options.force, signal });
          if (!globalOpts.quiet) {
            console.log(
              formatOutput(
                {
                  skipped: result.skipped,
                  successful: result.firstStage.successful,
                  attempted: result.firstStage.attempted,
                  state: result.reduction?.state ?? 'DONE',
                  stagesRun: result.reduction?.stagesRun ?? 1,
                  ...result.report,
                  rounds: result.reduction?.rounds ?? [],
                },
                globalOpts.format
              )
            );
          }
        } catch (error) {
          handleCliError(error);
        } finally {
          shutdownCliContext();
        }
      })
    );
}
