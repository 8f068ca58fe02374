export { NotificationService } from './NotificationService.js';
export { TelegramClient, describeTelegramError } from './TelegramClient.js';
export {
  formatFileMessage,
  formatStartupMessage,
  formatShutdownMessage,
  formatCrashMessage,
  escapeMarkdownV2,
} from './formatter.js';
export type { NotificationServiceConfig, WatchSummary, TelegramErrorDetail } from './types.js';
