// Inbound change notifications: verify, deduplicate, hand off to the worker pool
import type { JobQueue } from '../../jobs/queue/interface.js';
import { secretsMatch } from '../../lib/secrets.js';
import type { NotificationEvent, Subscription } from '../../shared/types/api.js';
import type { SubscriptionTable } from '../subscriptions/table.js';
import { DedupCache, dedupKey } from './dedup-cache.js';
import {
  batchItems,
  parseLifecycleNotification,
  parseNotification,
  type LifecycleEventType,
} from './payload.js';

export type RejectionReason =
  | 'Malformed'
  | 'UnknownSubscription'
  | 'InvalidSecret'
  | 'Duplicate'
  | 'Overloaded';

export type IntakeResult =
  | { status: 'accepted'; event: NotificationEvent; jobId: number }
  | { status: 'rejected'; reason: RejectionReason; subscriptionId?: string };

export type LifecycleResult =
  | { status: 'accepted'; subscriptionId: string; lifecycleEvent: LifecycleEventType }
  | { status: 'rejected'; reason: Exclude<RejectionReason, 'Duplicate' | 'Overloaded'>; subscriptionId?: string };

/** Early work the intake can ask of the scheduler */
export interface LifecycleTriggers {
  triggerSweep(reason: string): void;
  triggerPoll(reason: string): void;
}

export interface NotificationIntakeOptions {
  table: SubscriptionTable;
  dedup: DedupCache;
  queue: JobQueue;
  triggers?: LifecycleTriggers;
  maxAttempts?: number;
}

export class NotificationIntake {
  constructor(private readonly options: NotificationIntakeOptions) {}

  handle(raw: unknown): IntakeResult {
    const event = parseNotification(raw);
    if (!event) {
      return this.reject('Malformed');
    }

    const subscription = this.lookup(event.subscriptionId);
    if (!subscription) {
      return this.reject('UnknownSubscription', event.subscriptionId);
    }

    if (!secretsMatch(event.receivedClientState, subscription.clientStateSecret)) {
      return this.reject('InvalidSecret', event.subscriptionId);
    }

    const key = dedupKey(event);
    if (!this.options.dedup.tryClaim(key)) {
      return this.reject('Duplicate', event.subscriptionId, `message ${event.resourceId}`);
    }

    const jobId = this.options.queue.enqueue(
      {
        messageId: event.resourceId,
        subscriptionId: event.subscriptionId,
        changeType: event.changeType,
        source: 'push',
      },
      this.options.maxAttempts
    );

    if (jobId === null) {
      // Let the provider's redelivery through the dedup check
      this.options.dedup.release(key);
      return this.reject('Overloaded', event.subscriptionId, `message ${event.resourceId}`);
    }

    console.log(
      `[Intake] Accepted ${event.changeType} for message ${event.resourceId} (subscription ${event.subscriptionId}, job ${jobId})`
    );
    return { status: 'accepted', event, jobId };
  }

  /**
   * Handle every item of a `{ value: [...] }` payload.
   * A body of any other shape yields a single Malformed rejection.
   */
  handleBatch(body: unknown): IntakeResult[] {
    const items = batchItems(body);
    if (!items) {
      return [this.reject('Malformed')];
    }
    return items.map((item) => this.handle(item));
  }

  handleLifecycleBatch(body: unknown): LifecycleResult[] {
    const items = batchItems(body);
    if (!items) {
      return [this.reject('Malformed')];
    }
    return items.map((item) => this.handleLifecycle(item));
  }

  /**
   * reauthorizationRequired: renew at the next sweep, which runs now.
   * subscriptionRemoved: the record is expired; the sweep prunes it and a replacement is created.
   * missed: sweep and poll to catch up.
   */
  handleLifecycle(raw: unknown): LifecycleResult {
    const notification = parseLifecycleNotification(raw);
    if (!notification) {
      return this.reject('Malformed');
    }

    const { subscriptionId, lifecycleEvent } = notification;
    const subscription = this.options.table.get(subscriptionId);
    if (!subscription || subscription.status === 'revoked') {
      return this.reject('UnknownSubscription', subscriptionId);
    }
    if (!secretsMatch(notification.receivedClientState, subscription.clientStateSecret)) {
      return this.reject('InvalidSecret', subscriptionId);
    }

    console.log(`[Intake] Lifecycle event ${lifecycleEvent} for subscription ${subscriptionId}`);
    const triggers = this.options.triggers;

    switch (lifecycleEvent) {
      case 'reauthorizationRequired':
        this.options.table.update(subscriptionId, { status: 'expiring' });
        triggers?.triggerSweep(lifecycleEvent);
        break;
      case 'subscriptionRemoved':
        this.options.table.update(subscriptionId, { status: 'expired' });
        triggers?.triggerSweep(lifecycleEvent);
        triggers?.triggerPoll(lifecycleEvent);
        break;
      case 'missed':
        triggers?.triggerSweep(lifecycleEvent);
        triggers?.triggerPoll(lifecycleEvent);
        break;
    }

    return { status: 'accepted', subscriptionId, lifecycleEvent };
  }

  /** Only active or expiring subscriptions receive events */
  private lookup(subscriptionId: string): Subscription | undefined {
    const subscription = this.options.table.get(subscriptionId);
    if (!subscription) return undefined;
    return subscription.status === 'active' || subscription.status === 'expiring' ? subscription : undefined;
  }

  private reject<R extends RejectionReason>(
    reason: R,
    subscriptionId?: string,
    detail?: string
  ): { status: 'rejected'; reason: R; subscriptionId?: string } {
    const target = subscriptionId ? ` for subscription ${subscriptionId}` : '';
    console.warn(`[Intake] Rejected event${target}: ${reason}${detail ? ` (${detail})` : ''}`);
    return { status: 'rejected', reason, subscriptionId };
  }
}
