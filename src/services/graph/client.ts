// Microsoft Graph client: mailbox reads and the subscription control plane
import { z } from 'zod';
import { ProviderRejectedError } from '../../lib/errors.js';
import type {
  CreateSubscriptionRequest,
  MailGateway,
  MessageRecord,
  ProviderSubscription,
  SubscriptionProvider,
  TokenSource,
} from '../../shared/types/api.js';
import { createTransport, toAppError, type HttpResponse, type HttpTransport } from './http.js';
import { MESSAGE_SELECT, parseMessage } from './message-parser.js';

const GRAPH_BASE_URL = 'https://graph.microsoft.com/v1.0';
const PAGE_SIZE = 50;

const MessagePageSchema = z.object({
  value: z.array(z.unknown()).default([]),
  '@odata.nextLink': z.string().optional(),
});

const SubscriptionResponseSchema = z.object({
  id: z.string(),
  resource: z.string().optional(),
  expirationDateTime: z.string(),
});

type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

interface CallOptions {
  method: HttpMethod;
  /** Path under the Graph base URL, or an absolute URL (paging links) */
  path: string;
  params?: Record<string, string | number>;
  data?: unknown;
}

export interface GraphClientOptions {
  tokens: TokenSource;
  /** "me" for delegated auth, "users/{address}" for app auth */
  principal?: string;
  timeoutMs: number;
  /** Body text is cut to this many characters at fetch time */
  maxBodyChars?: number;
  transport?: HttpTransport;
  baseUrl?: string;
}

/**
 * Graph API client. Calls are single-shot with a timeout; failures surface as
 * AuthError / NotFoundError / TransientError / ProviderRejectedError and the
 * calling layer decides about retries.
 */
export class GraphClient implements MailGateway, SubscriptionProvider {
  private readonly transport: HttpTransport;
  private readonly baseUrl: string;
  private readonly principal: string;

  constructor(private readonly options: GraphClientOptions) {
    this.transport = options.transport ?? createTransport();
    this.baseUrl = options.baseUrl ?? GRAPH_BASE_URL;
    this.principal = options.principal ?? 'me';
  }

  /**
   * List unread messages in a folder, newest first, following @odata.nextLink
   */
  async listUnread(folder: string, maxCount = PAGE_SIZE): Promise<MessageRecord[]> {
    const messages: MessageRecord[] = [];
    let next: CallOptions | null = {
      method: 'GET',
      path: `/${this.principal}/mailFolders/${encodeURIComponent(folder)}/messages`,
      params: {
        $filter: 'isRead eq false',
        $orderby: 'receivedDateTime desc',
        $top: Math.min(PAGE_SIZE, maxCount),
        $select: MESSAGE_SELECT,
      },
    };

    while (next && messages.length < maxCount) {
      const response: HttpResponse<unknown> = await this.call('List unread messages', next, { folder });
      const page = MessagePageSchema.parse(response.data);

      for (const raw of page.value) {
        messages.push(parseMessage(raw, this.options.maxBodyChars));
      }

      const nextLink = page['@odata.nextLink'];
      next = nextLink ? { method: 'GET', path: nextLink } : null;
    }

    return messages.slice(0, maxCount);
  }

  /**
   * Get single message by ID
   */
  async getById(id: string): Promise<MessageRecord> {
    const response = await this.call(
      'Get message',
      {
        method: 'GET',
        path: `/${this.principal}/messages/${encodeURIComponent(id)}`,
        params: { $select: MESSAGE_SELECT },
      },
      { messageId: id }
    );

    return parseMessage(response.data, this.options.maxBodyChars);
  }

  /**
   * POST /subscriptions. Graph validates the notification URL synchronously
   * (validation request) before it answers.
   */
  async createSubscription(request: CreateSubscriptionRequest): Promise<ProviderSubscription> {
    const response = await this.call(
      'Create subscription',
      {
        method: 'POST',
        path: '/subscriptions',
        data: {
          changeType: request.changeType,
          notificationUrl: request.notificationUrl,
          lifecycleNotificationUrl: request.lifecycleNotificationUrl,
          resource: request.resource,
          expirationDateTime: request.expiration.toISOString(),
          clientState: request.clientState,
        },
      },
      { resource: request.resource }
    );

    return this.toProviderSubscription(response.data, request.resource);
  }

  /**
   * PATCH /subscriptions/{id} with a new expiration
   */
  async renewSubscription(subscriptionId: string, expiration: Date): Promise<ProviderSubscription> {
    const response = await this.call(
      'Renew subscription',
      {
        method: 'PATCH',
        path: `/subscriptions/${encodeURIComponent(subscriptionId)}`,
        data: { expirationDateTime: expiration.toISOString() },
      },
      { subscriptionId }
    );

    return this.toProviderSubscription(response.data);
  }

  async deleteSubscription(subscriptionId: string): Promise<void> {
    await this.call(
      'Delete subscription',
      { method: 'DELETE', path: `/subscriptions/${encodeURIComponent(subscriptionId)}` },
      { subscriptionId }
    );
  }

  private toProviderSubscription(data: unknown, fallbackResource = ''): ProviderSubscription {
    const parsed = SubscriptionResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderRejectedError('Subscription response is missing id or expirationDateTime');
    }

    return {
      id: parsed.data.id,
      resource: parsed.data.resource ?? fallbackResource,
      expiration: new Date(parsed.data.expirationDateTime),
    };
  }

  private async call(
    operation: string,
    options: CallOptions,
    context: Record<string, unknown>
  ): Promise<HttpResponse<unknown>> {
    const token = await this.options.tokens.getToken();
    const url = options.path.startsWith('http') ? options.path : `${this.baseUrl}${options.path}`;

    try {
      return await this.transport.request({
        url,
        method: options.method,
        params: options.params,
        data: options.data,
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
        },
        timeout: this.options.timeoutMs,
      });
    } catch (error) {
      throw toAppError(error, operation, context);
    }
  }
}
