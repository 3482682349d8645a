#!/usr/bin/env node
import 'dotenv/config';
import { buildProgram } from './cli.js';
import { logger } from './utils/logger.js';

process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'unhandled_rejection');
});
process.on('uncaughtException', (err) => {
  logger.error({ err }, 'uncaught_exception');
  process.exitCode = 1;
});

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    logger.error({ err }, 'cli_failed');
    process.exitCode = 1;
  });
