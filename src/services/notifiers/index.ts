import type { NotificationSink } from '../../shared/types/api.js';
import { ConsoleSink } from './console.js';
import { TelegramSink } from './telegram.js';

export interface NotifierConfig {
  type: 'console' | 'telegram';
  maxLength?: number;
  telegramBotToken?: string;
  telegramChatId?: string;
}

export function createNotificationSink(config: NotifierConfig): NotificationSink {
  if (config.type === 'telegram') {
    if (!config.telegramBotToken || !config.telegramChatId) {
      throw new Error('Telegram notifier requires TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID');
    }
    return new TelegramSink({
      botToken: config.telegramBotToken,
      chatId: config.telegramChatId,
      maxLength: config.maxLength,
    });
  }

  return new ConsoleSink(config.maxLength);
}

export { ConsoleSink } from './console.js';
export { TelegramSink, TELEGRAM_MAX_LENGTH } from './telegram.js';
