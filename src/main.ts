/**
 * Start-up sequence: CLI → env file → configuration → logger → App.
 * Resolves with the exit code of the process.
 */

import { App } from './app.js';
import { CliError, USAGE, parseCli, type CliOptions } from './cli.js';
import { ConfigError, loadConfig, loadEnvFile, type Config, type Env } from './config.js';
import { configureLogger, logger, maskSecret } from './logger.js';

export interface Runnable {
  run(): Promise<number>;
  stop(reason?: string): Promise<void>;
}

export interface MainDependencies {
  createApp?: (config: Config) => Runnable;
}

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

export async function main(
  argv: string[],
  env: Env,
  dependencies: MainDependencies = {}
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCli(argv);
  } catch (error) {
    if (error instanceof CliError) {
      process.stderr.write(`${error.message}\n\n${USAGE}`);
      return 2;
    }
    throw error;
  }

  if (options.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  let config: Config;
  try {
    loadEnvFile(options.envFile, env);
    config = loadConfig(env, options.environment);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Invalid configuration, not starting', { problems: error.problems });
      return 1;
    }
    throw error;
  }

  const logFile = configureLogger({
    level: config.logging.level,
    folder: config.logging.folder,
    verbose: options.verbose,
  });

  logger.info('='.repeat(50));
  logger.info('Folder Watch Notifier');
  logger.info('='.repeat(50));
  logger.info('Configuration loaded', {
    environment: config.environment,
    folder: config.watch.folder,
    extensions: [...config.watch.extensions],
    botToken: maskSecret(config.telegram.botToken),
    logFile,
  });

  const createApp = dependencies.createApp ?? ((appConfig: Config) => new App(appConfig));
  const app = createApp(config);

  // Graceful shutdown handler
  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, initiating graceful shutdown...`);
    app.stop(`Received ${signal}`).catch((error: unknown) => {
      logger.error('Error during shutdown', {
        error: error instanceof Error ? error.message : String(error),
      });
    });
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, shutdown);
  }

  try {
    return await app.run();
  } finally {
    for (const signal of SHUTDOWN_SIGNALS) {
      process.off(signal, shutdown);
    }
  }
}
