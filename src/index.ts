#!/usr/bin/env node
/**
 * Folder Watch Notifier
 *
 * Entry point for the application.
 */

import { createExit } from './exit.js';
import { main } from './main.js';
import { logger } from './logger.js';

const exit = createExit();

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  exit(1);
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
});

main(process.argv.slice(2), process.env)
  .then(exit)
  .catch((error: unknown) => {
    logger.error('Failed to start application', {
      error: error instanceof Error ? error.message : String(error),
    });
    exit(1);
  });
