/**
 * Run CLI Command
 *
 * process -> summarize -> combine in one invocation.
 */

import { Command } from 'commander';
import { z } from 'zod';
import { getCliContext, shutdownCliContext } from '../utils/context.js';
import { formatOutput } from '../utils/output.js';
import { handleCliError } from '../utils/errors.js';
import { parsePositiveInt } from '../utils/parsers.js';
import { typedAction } from '../utils/typed-action.js';

const RunOptionsSchema = z.object({
  force: z.boolean().default(false),
  maxTokens: z.number().int().positive().optional(),
  tokenLimit: z.number().int().positive().optional(),
  concurrency: z.number().int().positive().optional(),
});

export function addRunCommand(program: Command): void {
  program
    .command('run')
    .description('Process, summarize and combine in one pass')
    .option('--force', 'Re-summarize chunks that already have a summary', false)
    .option('--max-tokens <n>', 'Maximum tokens per chunk', parsePositiveInt)
    .option('--token-limit <n>', 'Target token count for the combined summary', parsePositiveInt)
    .option('--concurrency <n>', 'Maximum concurrent summarization calls', parsePositiveInt)
    .action(
      typedAction(RunOptionsSchema, async (options, globalOpts) => {
        try {
          const { pipeline, signal } = getCliContext({
            chunkMaxTokens: options.maxTokens,
            targetTokens: options.tokenLimit,
            concurrency: options.concurrency,
          });
          const result = await pipeline.run({ force: options.force, signal });
          if (!globalOpts.quiet) {
            console.log(
              formatOutput(
                {
                  documents: result.process.documents,
                  chunks: result.process.totalChunks,
                  summarized: `${result.summarize.firstStage.successful}/${result.summarize.firstStage.attempted}`,
                  state: result.summarize.reduction?.state ?? 'DONE',
                  combined: result.combine.combined?.path,
                  optimized: result.combine.optimized?.path,
                  ...result.summarize.report,
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
