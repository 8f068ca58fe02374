/**
 * Telegram Client
 *
 * Handles communication with Telegram Bot API.
 * One attempt per message: failures are logged and reported, never retried.
 */

import TelegramBot from 'node-telegram-bot-api';
import { logger, maskSecret } from '../logger.js';
import type { TelegramErrorDetail } from './types.js';

export interface TelegramClientConfig {
  botToken: string;
  chatId: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Pull the library error code, HTTP status and API description out of a
 * failed request
 */
export function describeTelegramError(error: unknown): TelegramErrorDetail {
  const detail: TelegramErrorDetail = {
    error: error instanceof Error ? error.message : String(error),
  };

  if (!isRecord(error)) {
    return detail;
  }

  if (typeof error.code === 'string') {
    detail.code = error.code;
  }

  const response = error.response;
  if (isRecord(response)) {
    if (typeof response.statusCode === 'number') {
      detail.statusCode = response.statusCode;
    }
    const body = response.body;
    if (isRecord(body) && typeof body.description === 'string') {
      detail.description = body.description;
    }
  }

  return detail;
}

export class TelegramClient {
  private bot: TelegramBot;
  private chatId: string;

  constructor(config: TelegramClientConfig) {
    this.bot = new TelegramBot(config.botToken, { polling: false });
    this.chatId = config.chatId;

    logger.info('Telegram client initialized', {
      chatId: maskSecret(config.chatId),
    });
  }

  /**
   * Send a MarkdownV2 message.
   * Returns true if message was sent successfully
   */
  public async sendMessage(text: string): Promise<boolean> {
    try {
      await this.bot.sendMessage(this.chatId, text, {
        parse_mode: 'MarkdownV2',
        disable_web_page_preview: true,
      });

      logger.debug('Telegram message sent successfully');
      return true;
    } catch (error) {
      logger.error('Failed to send Telegram message', describeTelegramError(error));
      return false;
    }
  }

  /**
   * Verify the bot token is valid
   */
  public async verifyConnection(): Promise<boolean> {
    try {
      const me = await this.bot.getMe();
      logger.info('Telegram bot verified', {
        username: me.username,
      });
      return true;
    } catch (error) {
      logger.error('Failed to verify Telegram bot', describeTelegramError(error));
      return false;
    }
  }
}
