/**
 * Process exit after the logger has flushed its file transports
 */

import { logger } from './logger.js';

const FLUSH_TIMEOUT_MS = 2000;

export type ExitFn = (code: number) => void;

/**
 * Build the exit function used by the entry point. Only the first call
 * ends the logger; later calls are ignored.
 */
export function createExit(exitProcess: ExitFn = (code) => process.exit(code)): ExitFn {
  let exiting = false;

  return (code: number): void => {
    if (exiting) return;
    exiting = true;
    process.exitCode = code;

    let exited = false;
    const leave = (): void => {
      if (exited) return;
      exited = true;
      exitProcess(code);
    };

    logger.once('finish', leave);
    logger.end();
    setTimeout(leave, FLUSH_TIMEOUT_MS).unref();
  };
}
