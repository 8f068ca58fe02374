import { parseArgs } from 'util';
import { ENVIRONMENTS, isEnvironment, type Environment } from './config.js';

export const USAGE = `Usage: folder-watch-notifier --env <dev|live> [options]

Watch a folder and send a Telegram message when a file with a monitored
extension appears.

Options:
  -e, --env <dev|live>   Environment, selects FOLDER_MONITOR_DEV or FOLDER_MONITOR_LIVE
  -v, --verbose          Also write log lines to the console
      --env-file <path>  Load environment variables from this file (default: .env)
  -h, --help             Show this help
`;

export type CliOptions =
  | { help: true }
  | {
      help: false;
      environment: Environment;
      verbose: boolean;
      envFile?: string;
    };

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

export function parseCli(argv: string[]): CliOptions {
  let values: { help?: boolean; verbose?: boolean; env?: string; 'env-file'?: string };

  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        help: { type: 'boolean', short: 'h' },
        verbose: { type: 'boolean', short: 'v' },
        env: { type: 'string', short: 'e' },
        'env-file': { type: 'string' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    throw new CliError(error instanceof Error ? error.message : String(error));
  }

  if (values.help) {
    return { help: true };
  }

  const environment = values.env;
  if (environment === undefined || !isEnvironment(environment)) {
    throw new CliError(
      `Environment value --env/-e required. Possible values: ${ENVIRONMENTS.join(' / ')}`
    );
  }

  return {
    help: false,
    environment,
    verbose: values.verbose ?? false,
    envFile: values['env-file'],
  };
}
