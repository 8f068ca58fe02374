/**
 * Application
 *
 * Main application that wires the modules together:
 * Folder Watcher → Extension Filter → Notification Service
 *
 * The watcher is consumed as a stream; each file event is filtered and
 * notified to completion before the next one is read.
 */

import { logger } from './logger.js';
import type { Config } from './config.js';
import { NotificationService } from './notification/index.js';
import { FolderWatcher, isMonitoredFile } from './watcher/index.js';
import type { FileEvent, FileEventSource } from './watcher/index.js';

export type AppState = 'starting' | 'running' | 'stopped';

export interface AppDependencies {
  source?: FileEventSource;
  notifications?: NotificationService;
}

export interface AppStatus {
  state: AppState;
  sent: number;
  failed: number;
  ignored: number;
}

export class App {
  private config: Config;
  private source: FileEventSource;
  private notificationService: NotificationService;
  private state: AppState = 'starting';
  private stopReason = 'Manual shutdown';
  private counters = { sent: 0, failed: 0, ignored: 0 };

  constructor(config: Config, dependencies: AppDependencies = {}) {
    this.config = config;

    this.source =
      dependencies.source ??
      new FolderWatcher({
        folder: config.watch.folder,
        recursive: config.watch.recursive,
        stabilityThresholdMs: config.watch.stabilityThresholdMs,
      });

    this.notificationService =
      dependencies.notifications ??
      new NotificationService({
        botToken: config.telegram.botToken,
        chatId: config.telegram.chatId,
        environment: config.environment,
      });

    this.notificationService.on('sent', () => {
      this.counters.sent++;
    });
    this.notificationService.on('failed', () => {
      this.counters.failed++;
    });
  }

  /**
   * Start watching and process events until stopped.
   * Resolves with the process exit code.
   */
  public async run(): Promise<number> {
    logger.info('Starting folder monitor', {
      environment: this.config.environment,
      folder: this.config.watch.folder,
      extensions: [...this.config.watch.extensions],
    });

    // A bad token is reported but does not stop the watcher
    const telegramOk = await this.notificationService.verifyConnection();
    if (!telegramOk) {
      logger.error('Telegram connection could not be verified, notifications may fail');
    }

    try {
      await this.source.start();
    } catch (error) {
      logger.error('Failed to start folder watcher', {
        error: error instanceof Error ? error.message : String(error),
      });
      this.state = 'stopped';
      await this.source.stop();
      return 1;
    }

    if (this.state === 'stopped') {
      return this.finish(0);
    }
    this.state = 'running';
    logger.info('Monitoring started', { folder: this.config.watch.folder });

    if (this.config.notifications.lifecycle) {
      await this.notificationService.sendStartupNotification({
        environment: this.config.environment,
        folder: this.config.watch.folder,
        extensions: this.config.watch.extensions,
      });
    }

    try {
      for await (const event of this.source) {
        await this.handleFileEvent(event);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Folder monitoring failed', { error: message });
      this.state = 'stopped';
      await this.source.stop();

      if (this.config.notifications.lifecycle) {
        await this.notificationService.sendCrashNotification(message);
      }
      return this.finish(1);
    }

    this.state = 'stopped';
    await this.source.stop();

    if (this.config.notifications.lifecycle) {
      await this.notificationService.sendShutdownNotification(this.stopReason);
    }
    return this.finish(0);
  }

  /**
   * Stop watching. Events already detected are still processed
   * before run() resolves.
   */
  public async stop(reason: string = 'Manual shutdown'): Promise<void> {
    if (this.state === 'stopped') return;

    logger.info('Stopping folder monitor', { reason });

    this.stopReason = reason;
    this.state = 'stopped';
    await this.source.stop();
  }

  public getStatus(): AppStatus {
    return {
      state: this.state,
      ...this.counters,
    };
  }

  private async handleFileEvent(event: FileEvent): Promise<void> {
    if (!isMonitoredFile(event, this.config.watch.extensions)) {
      logger.debug('Ignoring file with unmonitored extension', {
        file: event.path,
        extension: event.extension,
      });
      this.counters.ignored++;
      return;
    }

    logger.info('Detected monitored file', { file: event.path });

    try {
      await this.notificationService.notifyFile(event);
    } catch (error) {
      // One bad event must not end the watch
      logger.error('Failed to process file event', {
        file: event.path,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private finish(exitCode: number): number {
    logger.info('Monitoring stopped', { exitCode, ...this.counters });
    return exitCode;
  }
}
