/**
 * Config CLI Command
 *
 * List the environment variables the pipeline reads.
 */

import { Command } from 'commander';
import { z } from 'zod';
import { configRegistry } from '../../config/index.js';
import { getAllEnvVars } from '../../config/registry/index.js';
import { formatOutput } from '../utils/output.js';
import { handleCliError } from '../utils/errors.js';
import { typedAction } from '../utils/typed-action.js';

const MASK = '********';

export interface EnvVarRow {
  envKey: string;
  section: string;
  value: string;
  default: string;
  description: string;
}

export function describeEnvVars(env: NodeJS.ProcessEnv = process.env): EnvVarRow[] {
  return getAllEnvVars(configRegistry).map((v) => {
    const current = env[v.envKey];
    return {
      envKey: v.envKey,
      section: v.section,
      value: current === undefined ? '' : v.sensitive ? MASK : current,
      default: v.defaultValue === undefined ? '' : String(v.defaultValue),
      description: v.description,
    };
  });
}

export function addConfigCommand(program: Command): void {
  program
    .command('config')
    .description('List configuration environment variables')
    .action(
      typedAction(z.object({}), async (_options, globalOpts) => {
        try {
          console.log(formatOutput({ variables: describeEnvVars() }, globalOpts.format));
        } catch (error) {
          handleCliError(error);
        }
      })
    );
}
