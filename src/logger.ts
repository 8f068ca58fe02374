import { mkdirSync } from 'fs';
import path from 'path';
import winston from 'winston';
import type { LogType } from './config.js';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Custom log format
const logFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
  let log = `${timestamp} [${level}]: ${message}`;

  // Add stack trace for errors
  if (stack) {
    log += `\n${stack}`;
  }

  // Add metadata if present
  if (Object.keys(meta).length > 0) {
    log += ` ${JSON.stringify(meta)}`;
  }

  return log;
});

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

const WINSTON_LEVELS: Record<LogType, string> = {
  ERROR: 'error',
  WARNING: 'warn',
  INFO: 'info',
  DEBUG: 'debug',
};

function createConsoleTransport() {
  return new winston.transports.Console({
    format: combine(colorize(), timestamp({ format: TIMESTAMP_FORMAT }), logFormat),
  });
}

// Console only until configureLogger() runs, so start-up errors stay visible
export const logger = winston.createLogger({
  level: 'info',
  format: combine(errors({ stack: true }), timestamp({ format: TIMESTAMP_FORMAT }), logFormat),
  transports: [createConsoleTransport()],
});

export interface LoggerOptions {
  level: LogType;
  folder: string;
  /** Mirror log lines to the console */
  verbose: boolean;
}

export function toWinstonLevel(level: LogType): string {
  return WINSTON_LEVELS[level];
}

/**
 * Log file name for a run started at `startedAt`, e.g.
 * `file-monitor-2026-01-02_03-04-05.log`
 */
export function buildLogFileName(startedAt: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const date = `${startedAt.getFullYear()}-${pad(startedAt.getMonth() + 1)}-${pad(startedAt.getDate())}`;
  const time = `${pad(startedAt.getHours())}-${pad(startedAt.getMinutes())}-${pad(startedAt.getSeconds())}`;
  return `file-monitor-${date}_${time}.log`;
}

/**
 * Point the shared logger at the configured log folder.
 * Returns the path of the log file for this run.
 */
export function configureLogger(options: LoggerOptions, startedAt: Date = new Date()): string {
  mkdirSync(options.folder, { recursive: true });
  const filename = path.join(options.folder, buildLogFileName(startedAt));

  const fileTransport = new winston.transports.File({ filename });
  const transports = options.verbose ? [fileTransport, createConsoleTransport()] : [fileTransport];

  logger.configure({
    level: toWinstonLevel(options.level),
    format: combine(errors({ stack: true }), timestamp({ format: TIMESTAMP_FORMAT }), logFormat),
    transports,
  });

  return filename;
}

// Mask sensitive data in logs
export function maskSecret(secret: string): string {
  if (secret.length <= 8) {
    return '****';
  }
  return `${secret.substring(0, 4)}****${secret.substring(secret.length - 4)}`;
}
