// Telegram Bot API sink
import { z } from 'zod';
import { AppError, DeliveryError } from '../../lib/errors.js';
import type { NotificationSink } from '../../shared/types/api.js';
import { createTransport, type HttpTransport } from '../graph/http.js';

export const TELEGRAM_MAX_LENGTH = 3800;

const SendMessageResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

const TelegramFailureSchema = z.object({
  response: z.object({ status: z.number(), data: z.unknown().optional() }).optional(),
});

export interface TelegramSinkOptions {
  botToken: string;
  chatId: string;
  maxLength?: number;
  timeoutMs?: number;
  transport?: HttpTransport;
  apiBaseUrl?: string;
}

export class TelegramSink implements NotificationSink {
  readonly name = 'telegram';
  readonly maxLength: number;
  private readonly transport: HttpTransport;

  constructor(private readonly options: TelegramSinkOptions) {
    this.maxLength = options.maxLength ?? TELEGRAM_MAX_LENGTH;
    this.transport = options.transport ?? createTransport();
  }

  async send(text: string): Promise<void> {
    const baseUrl = this.options.apiBaseUrl ?? 'https://api.telegram.org';
    let data: unknown;

    try {
      const response = await this.transport.request({
        url: `${baseUrl}/bot${this.options.botToken}/sendMessage`,
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        data: {
          chat_id: this.options.chatId,
          text,
          disable_web_page_preview: true,
        },
        timeout: this.options.timeoutMs ?? 10_000,
      });
      data = response.data;
    } catch (error) {
      throw this.toDeliveryError(error);
    }

    const parsed = SendMessageResponseSchema.safeParse(data);
    if (!parsed.success || !parsed.data.ok) {
      const description = parsed.success ? parsed.data.description : undefined;
      throw new DeliveryError(`Telegram rejected message${description ? `: ${description}` : ''}`);
    }
  }

  // The request URL carries the bot token, so only the status makes it into the message
  private toDeliveryError(error: unknown): AppError {
    const failure = TelegramFailureSchema.safeParse(error);
    const status = failure.success ? failure.data.response?.status : undefined;

    if (status === undefined) {
      return new DeliveryError('Telegram request failed without a response', undefined, { cause: error });
    }

    const message = `Telegram request failed with HTTP ${status}`;
    if (status === 429 || status >= 500) {
      return new DeliveryError(message, { status }, { cause: error });
    }
    // Bad chat id, blocked bot, revoked token: resending will not help
    return new AppError(message, 'delivery', false, { status }, { cause: error });
  }
}
