#!/usr/bin/env node
import { run } from 'cmd-ts';
import { cli } from './cli';
import { errorMessage } from './errors';
import { logger } from './services/structuredLogging';

process.on('unhandledRejection', (reason) => {
  logger.error('cli', `Unhandled rejection: ${errorMessage(reason)}`);
  process.exit(1);
});

run(cli, process.argv.slice(2)).catch((error: unknown) => {
  logger.error('cli', `Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
