/**
 * Notification Service
 *
 * Output layer: turns detected files and lifecycle changes into
 * Telegram messages. Each message gets exactly one delivery attempt.
 */

import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import type { Environment } from '../config.js';
import type { FileEvent } from '../watcher/types.js';
import type { NotificationServiceConfig, WatchSummary } from './types.js';
import { TelegramClient } from './TelegramClient.js';
import {
  formatFileMessage,
  formatStartupMessage,
  formatShutdownMessage,
  formatCrashMessage,
} from './formatter.js';

interface NotificationEventTypes {
  sent: [FileEvent];
  failed: [FileEvent];
}

export class NotificationService extends EventEmitter<NotificationEventTypes> {
  private client: TelegramClient;
  private environment: Environment;

  constructor(config: NotificationServiceConfig, client?: TelegramClient) {
    super();

    this.client =
      client ??
      new TelegramClient({
        botToken: config.botToken,
        chatId: config.chatId,
      });
    this.environment = config.environment;

    logger.info('Notification Service initialized', { environment: config.environment });
  }

  /**
   * Verify Telegram connection on startup
   */
  public async verifyConnection(): Promise<boolean> {
    return this.client.verifyConnection();
  }

  /**
   * Notify about a monitored file. Resolves false when delivery failed;
   * the event is dropped either way.
   */
  public async notifyFile(event: FileEvent): Promise<boolean> {
    const message = formatFileMessage(event, this.environment);
    const success = await this.client.sendMessage(message);

    if (success) {
      logger.info('File notification sent', { file: event.path });
      this.emit('sent', event);
    } else {
      logger.error('Failed to send file notification, event dropped', { file: event.path });
      this.emit('failed', event);
    }

    return success;
  }

  /**
   * Send startup notification
   */
  public async sendStartupNotification(summary: WatchSummary): Promise<boolean> {
    return this.client.sendMessage(formatStartupMessage(summary));
  }

  /**
   * Send shutdown notification
   */
  public async sendShutdownNotification(reason: string): Promise<boolean> {
    return this.client.sendMessage(formatShutdownMessage(reason));
  }

  /**
   * Send crash notification
   */
  public async sendCrashNotification(errorMessage: string): Promise<boolean> {
    logger.warn('Sending crash notification', { error: errorMessage });
    return this.client.sendMessage(formatCrashMessage(errorMessage));
  }
}
