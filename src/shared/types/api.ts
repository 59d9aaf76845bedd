import type { ErrorKind } from '../../lib/errors.js';

/**
 * Shared API Contracts
 * Collaborators of the digest core implement these interfaces so adapters can be swapped
 */

// ============================================================================
// MAIL
// ============================================================================

export interface MessageRecord {
  id: string;
  subject: string;
  sender: string;
  receivedAt: Date | null;
  /** Plain text body, possibly truncated at fetch time */
  bodyText: string;
  isRead: boolean;
}

/**
 * Mail gateway interface
 * Implementations: src/services/graph/client.ts
 *
 * getById fails with NotFoundError, AuthError or TransientError.
 */
export interface MailGateway {
  listUnread(folder: string, maxCount?: number): Promise<MessageRecord[]>;
  getById(id: string): Promise<MessageRecord>;
}

// ============================================================================
// CREDENTIALS
// ============================================================================

/**
 * Access token source. May block on the first call (interactive consent),
 * later calls read a cached token. Fails with AuthError.
 * Implementations: src/services/graph/token-provider.ts
 */
export interface TokenSource {
  getToken(): Promise<string>;
}

// ============================================================================
// SUMMARIZATION
// ============================================================================

export interface SummaryInput {
  subject: string;
  sender: string;
  text: string;
}

/**
 * Summarizer interface. Must not throw for empty or oversized text.
 * Implementations: src/services/summarizer/
 */
export interface Summarizer {
  readonly name: string;
  summarize(input: SummaryInput): Promise<string>;
}

// ============================================================================
// NOTIFICATION SINK
// ============================================================================

/**
 * Notification sink interface. send() fails with DeliveryError.
 * Implementations: src/services/notifiers/
 */
export interface NotificationSink {
  readonly name: string;
  readonly maxLength: number;
  send(text: string): Promise<void>;
}

// ============================================================================
// SUBSCRIPTIONS
// ============================================================================

export type SubscriptionStatus = 'pending' | 'active' | 'expiring' | 'expired' | 'revoked';

export type ChangeType = 'created' | 'updated' | 'deleted';

export interface Subscription {
  id: string;
  resource: string;
  changeType: string;
  expiration: Date;
  /** When the current expiration was granted; expiration - issuedAt is the total lifetime */
  issuedAt: Date;
  clientStateSecret: string;
  status: SubscriptionStatus;
}

export interface CreateSubscriptionRequest {
  resource: string;
  changeType: string;
  notificationUrl: string;
  lifecycleNotificationUrl?: string;
  expiration: Date;
  clientState: string;
}

export interface ProviderSubscription {
  id: string;
  resource: string;
  expiration: Date;
}

/**
 * Provider-side subscription API (control plane).
 * Implementations: src/services/graph/client.ts
 */
export interface SubscriptionProvider {
  createSubscription(request: CreateSubscriptionRequest): Promise<ProviderSubscription>;
  renewSubscription(subscriptionId: string, expiration: Date): Promise<ProviderSubscription>;
  deleteSubscription(subscriptionId: string): Promise<void>;
}

// ============================================================================
// NOTIFICATIONS & DIGESTS
// ============================================================================

export interface NotificationEvent {
  subscriptionId: string;
  resourceId: string;
  changeType: ChangeType;
  receivedClientState: string;
}

export type DigestSource = 'push' | 'poll' | 'manual';

export type DeliveryStatus = 'delivered' | 'failed' | 'skipped';

export interface DigestFailure {
  kind: ErrorKind;
  message: string;
  retryable: boolean;
}

export interface DigestResult {
  sourceMessageId: string;
  /** Formatted digest text; kept on delivery failure so the caller can resend it */
  summaryText: string | null;
  deliveryStatus: DeliveryStatus;
  failure?: DigestFailure;
}

export interface DigestContext {
  source: DigestSource;
  subscriptionId?: string;
  changeType?: ChangeType;
}
