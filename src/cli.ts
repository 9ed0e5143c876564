#!/usr/bin/env node
// CLI entry point for docsqueeze
// The .env file must be loaded before config is first imported

process.env.DOTENV_CONFIG_QUIET = 'true';

import { loadEnv } from './config/env.js';

async function main(): Promise<void> {
  loadEnv(process.cwd());

  const { runCli } = await import('./cli/index.js');
  const { handleCliError } = await import('./cli/utils/errors.js');

  try {
    await runCli(process.argv.slice(2));
  } catch (error) {
    handleCliError(error);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
