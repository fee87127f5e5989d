#!/usr/bin/env node

/**
 * cluster-scripter - command line entry point
 *
 * Builds one sftp/ssh session from the command line, then previews, prints
 * or runs it through expect.
 */

import { main } from './cli.js';
import { ErrorHandler } from './errors.js';
import { logger } from './logger.js';

// Log uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

// Log unhandled promise rejections
process.on('unhandledRejection', (reason, promise) => {
  logger.error('Unhandled Rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

main(process.argv.slice(2)).catch((error: unknown) => {
  logger.error('cluster-scripter failed', { error: ErrorHandler.describe(error) });
  console.error(ErrorHandler.describe(error));
  process.exit(1);
});
