#!/usr/bin/env node
import { program } from 'commander';
import { handleUnknownError } from './errors/index';
import { registerAnalyzeCommand, registerVerifyCommand } from './cli/commands';
import { APP_VERSION } from './config/constants';
import { loadDotEnv } from './boundaries/dotenv-loader';

// Load environment variables at startup
loadDotEnv();

program
  .name('deckproof')
  .description('Verify the factual claims in an investor pitch deck')
  .version(APP_VERSION);

registerAnalyzeCommand(program);
registerVerifyCommand(program);

program.parseAsync().catch((e: unknown) => {
  const err = handleUnknownError(e, 'Running command');
  console.error(`Error: ${err.message}`);
  process.exit(1);
});
