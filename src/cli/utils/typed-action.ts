/**
 * Type-safe action wrapper for Commander.js
 *
 * Commander hands actions loosely typed option bags. Each command declares a
 * zod schema for its options; the wrapper validates them together with the
 * global options before calling the handler.
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { createValidationError } from '../../core/errors.js';
import { formatZodErrors } from '../../config/registry/schema-builder.js';

export const GlobalOptionsSchema = z.object({
  format: z.enum(['json', 'table']).default('json'),
  quiet: z.boolean().default(false),
});

/**
 * Global CLI options available to all commands via --option flags
 */
export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

function parseOptions<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  field: string
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw createValidationError(field, formatZodErrors(result.error).join('; '));
  }
  return result.data;
}

/**
 * @example
 * ```typescript
 * program
 *   .command('summarize')
 *   .option('--force')
 *   .action(typedAction(z.object({ force: z.boolean().optional() }), async (options, globalOpts) => {
 *     console.log(options.force, globalOpts.format);
 *   }));
 * ```
 */
export function typedAction<TOptions>(
  schema: z.ZodType<TOptions, z.ZodTypeDef, unknown>,
  handler: (options: TOptions, globalOpts: GlobalOptions) => Promise<void>
): (options: unknown, cmd: Command) => Promise<void> {
  return async (options: unknown, cmd: Command) => {
    const globalOpts = parseOptions(GlobalOptionsSchema, cmd.optsWithGlobals(), 'options');
    await handler(parseOptions(schema, options, 'options'), globalOpts);
  };
}
