/**
 * CLI Main Program
 *
 * Commander.js program setup for the docsqueeze CLI.
 */

import { Command, Option } from 'commander';
import { VERSION } from '../version.js';

import { addProcessCommand } from './commands/process.js';
import { addSummarizeCommand } from './commands/summarize.js';
import { addCombineCommand } from './commands/combine.js';
import { addRunCommand } from './commands/run.js';
import { addCleanCommand } from './commands/clean.js';
import { addConfigCommand } from './commands/config.js';

/**
 * Create the Commander.js program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('docsqueeze')
    .description('Chunk, summarize and compress documentation into a token budget')
    .version(VERSION)
    .addOption(
      new Option('--format <format>', 'Output format').choices(['json', 'table']).default('json')
    )
    .option('--quiet', 'Suppress command output', false);

  registerCommands(program);

  return program;
}

/**
 * Register all subcommands
 */
function registerCommands(program: Command): void {
  // Pipeline stages
  addProcessCommand(program);
  addSummarizeCommand(program);
  addCombineCommand(program);
  addRunCommand(program);

  // Maintenance
  addCleanCommand(program);
  addConfigCommand(program);
}

/**
 * Run the CLI program
 */
export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv, { from: 'user' });
}
