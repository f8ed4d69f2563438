#!/usr/bin/env node
import { runCLI } from './cli/index.js';
import { wrapError } from './core/errors.js';
import { enableFileLogging, logError } from './utils/logger.js';

async function main(): Promise<void> {
  if (process.env['NODE_ENV'] !== 'test') {
    enableFileLogging();
  }
  await runCLI(process.argv);
}

main().catch((error: unknown) => {
  logError(wrapError(error));
  process.exitCode = 1;
});
