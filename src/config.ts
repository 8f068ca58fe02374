import { parse as parseDotenv } from 'dotenv';
import { existsSync, readFileSync, statSync } from 'fs';
import path from 'path';
import { parseExtensionList } from './watcher/extensionFilter.js';

export const ENVIRONMENTS = ['dev', 'live'] as const;
export type Environment = (typeof ENVIRONMENTS)[number];

export const LOG_TYPES = ['ERROR', 'WARNING', 'INFO', 'DEBUG'] as const;
export type LogType = (typeof LOG_TYPES)[number];

export type Env = Record<string, string | undefined>;

export const DEFAULT_ENV_FILE = '.env';

/** Environment variable holding the watched folder of each environment */
export const FOLDER_VARIABLES: Record<Environment, string> = {
  dev: 'FOLDER_MONITOR_DEV',
  live: 'FOLDER_MONITOR_LIVE',
};

export interface Config {
  readonly environment: Environment;
  readonly telegram: {
    readonly botToken: string;
    readonly chatId: string;
  };
  readonly watch: {
    readonly folder: string;
    /** Lower-case, without the leading dot */
    readonly extensions: ReadonlySet<string>;
    readonly recursive: boolean;
    /** How long a new file's size must stay unchanged before it is reported (0 disables) */
    readonly stabilityThresholdMs: number;
  };
  readonly notifications: {
    /** Send startup, shutdown and crash messages */
    readonly lifecycle: boolean;
  };
  readonly logging: {
    readonly level: LogType;
    readonly folder: string;
  };
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export function isEnvironment(value: string): value is Environment {
  return (ENVIRONMENTS as readonly string[]).includes(value);
}

function isLogType(value: string): value is LogType {
  return (LOG_TYPES as readonly string[]).includes(value);
}

/**
 * Load a dot-env file into `env` without overriding variables that are
 * already set. Only an explicitly requested file has to exist.
 */
export function loadEnvFile(filePath: string | undefined, env: Env): void {
  const target = filePath ?? DEFAULT_ENV_FILE;

  if (!existsSync(target)) {
    if (filePath !== undefined) {
      throw new ConfigError([`Env file not found: ${filePath}`]);
    }
    return;
  }

  let parsed: Record<string, string>;
  try {
    parsed = parseDotenv(readFileSync(target));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`Failed to load env file ${target}: ${message}`]);
  }

  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
}

/**
 * Reads typed values out of an environment, collecting every problem
 * instead of stopping at the first one.
 */
class EnvReader {
  readonly problems: string[] = [];

  constructor(private readonly env: Env) {}

  getEnvVar(key: string): string {
    const value = this.env[key]?.trim();
    if (!value) {
      this.problems.push(`Missing required environment variable: ${key}`);
      return '';
    }
    return value;
  }

  getEnvNumber(key: string, defaultValue: number): number {
    const value = this.env[key]?.trim();
    if (!value) {
      return defaultValue;
    }
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
      this.problems.push(`Environment variable ${key} must be a non-negative integer`);
      return defaultValue;
    }
    return parsed;
  }

  getEnvBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.env[key]?.trim().toLowerCase();
    if (!value) {
      return defaultValue;
    }
    if (value !== 'true' && value !== 'false') {
      this.problems.push(`Environment variable ${key} must be true or false`);
      return defaultValue;
    }
    return value === 'true';
  }
}

// Numeric ids (negative for groups) or public @channel usernames
const CHAT_ID_PATTERN = /^(-?\d+|@[A-Za-z]\w{3,})$/;

/**
 * Build the immutable configuration for `environment` from `env`.
 * Throws ConfigError listing every problem found.
 */
export function loadConfig(env: Env, environment: Environment): Config {
  const reader = new EnvReader(env);

  const botToken = reader.getEnvVar('TELEGRAM_BOT_TOKEN');

  const chatId = reader.getEnvVar('TELEGRAM_CHAT_ID');
  if (chatId && !CHAT_ID_PATTERN.test(chatId)) {
    reader.problems.push(
      'TELEGRAM_CHAT_ID must be a numeric chat id or an @channel username'
    );
  }

  const folders: Record<Environment, string> = {
    dev: reader.getEnvVar(FOLDER_VARIABLES.dev),
    live: reader.getEnvVar(FOLDER_VARIABLES.live),
  };
  const folder = folders[environment] ? path.resolve(folders[environment]) : '';
  if (folder) {
    const problem = checkDirectory(folder);
    if (problem) {
      reader.problems.push(`${FOLDER_VARIABLES[environment]}: ${problem}`);
    }
  }

  const rawExtensions = reader.getEnvVar('FILE_EXTENSIONS');
  const extensions = parseExtensionList(rawExtensions);
  if (rawExtensions && extensions.size === 0) {
    reader.problems.push('FILE_EXTENSIONS must list at least one extension');
  }

  const rawLogType = reader.getEnvVar('LOG_TYPE').toUpperCase();
  if (rawLogType && !isLogType(rawLogType)) {
    reader.problems.push(`LOG_TYPE must be one of ${LOG_TYPES.join(', ')}`);
  }
  const level: LogType = isLogType(rawLogType) ? rawLogType : 'INFO';

  const logFolder = reader.getEnvVar('LOG_FOLDER');

  const recursive = reader.getEnvBoolean('WATCH_RECURSIVE', false);
  const stabilityThresholdMs = reader.getEnvNumber('WATCH_STABILITY_MS', 1000);
  const lifecycle = reader.getEnvBoolean('NOTIFY_LIFECYCLE', true);

  if (reader.problems.length > 0) {
    throw new ConfigError(reader.problems);
  }

  return Object.freeze({
    environment,
    telegram: Object.freeze({ botToken, chatId }),
    watch: Object.freeze({ folder, extensions, recursive, stabilityThresholdMs }),
    notifications: Object.freeze({ lifecycle }),
    logging: Object.freeze({ level, folder: logFolder }),
  });
}

function checkDirectory(folder: string): string | null {
  try {
    if (!statSync(folder).isDirectory()) {
      return `Not a directory: ${folder}`;
    }
    return null;
  } catch {
    return `Folder does not exist: ${folder}`;
  }
}
