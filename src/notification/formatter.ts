/**
 * Message Formatter
 *
 * Builds Telegram MarkdownV2 messages. Every dynamic value goes through
 * escapeMarkdownV2 before it is placed in a message.
 */

import type { Environment } from '../config.js';
import type { FileEvent } from '../watcher/types.js';
import type { WatchSummary } from './types.js';

/**
 * Escape the characters MarkdownV2 reserves, backslash included
 */
export function escapeMarkdownV2(text: string): string {
  return text.replace(/[_*[\]()~`>#+\-=|{}.!\\]/g, '\\$&');
}

/**
 * Format a new monitored file into a Telegram message
 */
export function formatFileMessage(event: FileEvent, environment: Environment): string {
  return `*⚠️ New monitored file detected ⚠️*

• File: ${escapeMarkdownV2(event.name)}
• Path: ${escapeMarkdownV2(event.path)}
• Environment: ${escapeMarkdownV2(environment)}
• Detected: ${escapeMarkdownV2(event.detectedAt.toISOString())}`;
}

/**
 * Format a startup notification
 */
export function formatStartupMessage(summary: WatchSummary): string {
  const extensions = [...summary.extensions].join(', ');

  return `*ℹ️ File monitoring started ℹ️*

• Environment: ${escapeMarkdownV2(summary.environment)}
• Folder: ${escapeMarkdownV2(summary.folder)}
• Extensions: ${escapeMarkdownV2(extensions)}`;
}

/**
 * Format a shutdown notification
 */
export function formatShutdownMessage(reason: string): string {
  return `*🛑 File monitoring stopped 🛑*

• Reason: ${escapeMarkdownV2(reason)}`;
}

/**
 * Format an unrecoverable watcher failure
 */
export function formatCrashMessage(message: string): string {
  return `*⚠️ File monitoring crashed ⚠️*

${escapeMarkdownV2(message)}`;
}
