/**
 * Types for Notification Service
 */

import type { Environment } from '../config.js';

/**
 * Configuration for Notification Service
 */
export interface NotificationServiceConfig {
  botToken: string;
  chatId: string;
  environment: Environment;
}

/**
 * Where and what is being watched, for the startup message
 */
export interface WatchSummary {
  environment: Environment;
  folder: string;
  extensions: Iterable<string>;
}

/**
 * Details pulled out of a failed Bot API call
 */
export interface TelegramErrorDetail {
  error: string;
  code?: string;
  statusCode?: number;
  description?: string;
}
