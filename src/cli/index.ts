#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();

process.on('uncaughtException', (error) => {
  console.error('UNCAUGHT EXCEPTION:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('UNHANDLED REJECTION:', reason);
  process.exit(1);
});

import chalk from 'chalk';
import { Command } from 'commander';
import { configure, getConfig } from './config';
import { showSummaryCommand } from './commands/show-summary';
import { saveSummaryCommand } from './commands/save-summary';
import { getLogger } from '../utils/logger';
import { flushSentry, initSentry } from '../utils/sentry';

initSentry('estimator-summary');

const logger = getLogger('estimator-summary', { timestamp: false });

configure({
  errorHandler: (error: Error) => {
    console.error(chalk.red('\nError:'), error.message)
    if (process.env.DEBUG) {
      console.error(chalk.gray('\nStack trace:'), error.stack)
    }
    process.exit(1)
  },
  logger: {
    info: (msg: string) => logger.info(msg),
    warn: (msg: string) => logger.warn('⚠️  ' + msg),
    error: (msg: string) => logger.error('✖ ' + msg),
    success: (msg: string) => console.log(chalk.green('✓ ' + msg)),
  }
})

const cli = new Command();

cli
  .name('estimator-summary')
  .description('Shows and stores reproducibility summaries of fitted GLMs.')
  .version('0.1.0');

cli.addCommand(showSummaryCommand);
cli.addCommand(saveSummaryCommand);

cli.parseAsync(process.argv).catch((err: unknown) => {
  const error = err instanceof Error ? err : new Error(String(err));
  return flushSentry().finally(() => getConfig().errorHandler(error));
});
