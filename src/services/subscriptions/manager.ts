// Push subscription lifecycle: create, renew, revoke, sweep
import {
  AuthError,
  NotFoundError,
  ProviderRejectedError,
  errorKindOf,
  errorMessage,
} from '../../lib/errors.js';
import { KeyedLock } from '../../lib/keyed-lock.js';
import { withRetry, type RetryOptions } from '../../lib/retry.js';
import { generateClientState } from '../../lib/secrets.js';
import type { ProviderSubscription, Subscription, SubscriptionProvider } from '../../shared/types/api.js';
import { clampLifetime, expirationFrom, isPastExpiration, type RenewalPolicy } from './policy.js';
import type { SubscriptionTable } from './table.js';

export interface SubscriptionManagerOptions {
  provider: SubscriptionProvider;
  table: SubscriptionTable;
  policy: RenewalPolicy;
  notificationUrl: string;
  lifecycleNotificationUrl?: string;
  changeType: string;
  /** Lifetime requested on create (when none is given) and on every renewal */
  lifetimeMinutes: number;
  retries?: number;
  retryBaseDelayMs?: number;
  now?: () => Date;
}

function isRetryableControlError(error: unknown): boolean {
  const kind = errorKindOf(error);
  return kind === 'provider_rejected' || kind === 'transient';
}

function asRejection(error: unknown, message: string, context: Record<string, unknown>): Error {
  if (error instanceof AuthError || error instanceof NotFoundError || error instanceof ProviderRejectedError) {
    return error;
  }
  return new ProviderRejectedError(`${message}: ${errorMessage(error)}`, context, { cause: error });
}

export class SubscriptionManager {
  private readonly locks = new KeyedLock();
  private sweeping: Promise<Subscription[]> | null = null;
  private readonly now: () => Date;

  constructor(private readonly options: SubscriptionManagerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get(id: string): Subscription | undefined {
    return this.options.table.get(id);
  }

  list(): Subscription[] {
    return this.options.table.list();
  }

  /** Load persisted subscriptions into the table */
  restore(): number {
    const count = this.options.table.load();
    console.log(`[Subscriptions] Restored ${count} subscription(s)`);
    return count;
  }

  /**
   * Create a subscription. The provider validates the notification URL before it
   * answers, so the returned record is ready to receive events.
   */
  async create(
    resource: string,
    lifetimeMinutes = this.options.lifetimeMinutes,
    secret: string = generateClientState()
  ): Promise<Subscription> {
    const lifetime = clampLifetime(lifetimeMinutes, this.options.policy.maxLifetimeMinutes);
    const issuedAt = this.now();

    let created: ProviderSubscription;
    try {
      created = await withRetry(
        () =>
          this.options.provider.createSubscription({
            resource,
            changeType: this.options.changeType,
            notificationUrl: this.options.notificationUrl,
            lifecycleNotificationUrl: this.options.lifecycleNotificationUrl,
            expiration: expirationFrom(issuedAt, lifetime),
            clientState: secret,
          }),
        this.retryOptions('Create subscription')
      );
    } catch (error) {
      console.error(`[Subscriptions] Create for ${resource} failed (${errorKindOf(error)}): ${errorMessage(error)}`);
      if (error instanceof AuthError || error instanceof ProviderRejectedError) throw error;
      throw new ProviderRejectedError(`Subscription create failed: ${errorMessage(error)}`, { resource }, { cause: error });
    }

    const subscription = this.options.table.put({
      id: created.id,
      resource,
      changeType: this.options.changeType,
      expiration: created.expiration,
      issuedAt,
      clientStateSecret: secret,
      status: 'active',
    });

    console.log(
      `[Subscriptions] Created ${subscription.id} for ${resource}, expires ${subscription.expiration.toISOString()}`
    );
    return subscription;
  }

  /**
   * Extend a subscription by the full configured lifetime.
   * Fails with NotFoundError (unknown locally, or gone at the provider),
   * AuthError (record is revoked) or ProviderRejectedError.
   */
  renew(subscriptionId: string): Promise<Subscription> {
    return this.locks.run(subscriptionId, () => this.renewLocked(subscriptionId));
  }

  /**
   * Remote delete is best effort; the local record is always removed.
   */
  revoke(subscriptionId: string): Promise<void> {
    return this.locks.run(subscriptionId, async () => {
      if (!this.options.table.get(subscriptionId)) {
        throw new NotFoundError(`Subscription ${subscriptionId} is not tracked`, { subscriptionId });
      }

      try {
        await this.options.provider.deleteSubscription(subscriptionId);
      } catch (error) {
        console.warn(
          `[Subscriptions] Remote delete of ${subscriptionId} failed (${errorKindOf(error)}): ${errorMessage(error)}`
        );
      }

      this.options.table.remove(subscriptionId);
      console.log(`[Subscriptions] Revoked ${subscriptionId}`);
    });
  }

  /**
   * Renew everything inside its renewal window or already lapsed, then prune
   * expired/revoked records. Concurrent callers share the sweep in progress.
   */
  sweep(): Promise<Subscription[]> {
    if (!this.sweeping) {
      this.sweeping = this.runSweep().finally(() => {
        this.sweeping = null;
      });
    }
    return this.sweeping;
  }

  /**
   * Reuse a usable subscription for the resource, renewing it when due;
   * create one otherwise. Calls for the same resource run one at a time.
   */
  ensure(resource: string): Promise<Subscription> {
    return this.locks.run(`ensure:${resource}`, () => this.ensureLocked(resource));
  }

  private async ensureLocked(resource: string): Promise<Subscription> {
    const existing = this.list().find(
      (s) => s.resource === resource && (s.status === 'active' || s.status === 'expiring')
    );

    if (!existing) {
      return this.create(resource);
    }

    if (existing.status === 'active') {
      console.log(`[Subscriptions] Reusing ${existing.id} for ${resource}`);
      return existing;
    }

    try {
      return await this.renew(existing.id);
    } catch (error) {
      const current = this.get(existing.id);
      if (current && current.status === 'expiring') {
        console.warn(`[Subscriptions] Keeping ${existing.id} until it expires: ${errorMessage(error)}`);
        return current;
      }
      return this.create(resource);
    }
  }

  private async renewLocked(subscriptionId: string): Promise<Subscription> {
    const { table, provider } = this.options;
    const current = table.get(subscriptionId);

    if (!current) {
      throw new NotFoundError(`Subscription ${subscriptionId} is not tracked`, { subscriptionId });
    }
    if (current.status === 'revoked') {
      throw new AuthError(`Subscription ${subscriptionId} is revoked`, { subscriptionId });
    }

    const lifetime = clampLifetime(this.options.lifetimeMinutes, this.options.policy.maxLifetimeMinutes);
    const issuedAt = this.now();

    try {
      const renewed = await withRetry(
        () => provider.renewSubscription(subscriptionId, expirationFrom(issuedAt, lifetime)),
        this.retryOptions(`Renew subscription ${subscriptionId}`)
      );

      const updated = table.update(subscriptionId, {
        expiration: renewed.expiration,
        issuedAt,
        status: 'active',
      });
      if (!updated) {
        throw new NotFoundError(`Subscription ${subscriptionId} was removed during renewal`, { subscriptionId });
      }

      console.log(`[Subscriptions] Renewed ${subscriptionId} until ${updated.expiration.toISOString()}`);
      return updated;
    } catch (error) {
      if (error instanceof NotFoundError) {
        table.update(subscriptionId, { status: 'expired' });
        throw error;
      }
      if (error instanceof AuthError) {
        table.update(subscriptionId, { status: 'revoked' });
        throw error;
      }

      table.update(subscriptionId, { status: isPastExpiration(current, this.now()) ? 'expired' : 'expiring' });
      throw asRejection(error, `Renewal of ${subscriptionId} failed`, { subscriptionId });
    }
  }

  private async runSweep(): Promise<Subscription[]> {
    const { table } = this.options;
    const now = this.now();

    // Lapsed records get one last renewal; ones the provider already dropped do not
    const due = table
      .list()
      .filter((s) => s.status === 'expiring' || (s.status === 'expired' && isPastExpiration(s, now)));
    for (const subscription of due) {
      table.update(subscription.id, { status: 'expiring' });
    }

    const results = await Promise.allSettled(due.map((s) => this.renew(s.id)));
    let renewed = 0;
    results.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        renewed++;
      } else {
        console.error(
          `[Sweep] Renewal of ${due[i].id} failed (${errorKindOf(result.reason)}): ${errorMessage(result.reason)}`
        );
      }
    });

    let pruned = 0;
    for (const subscription of table.list()) {
      const finished = subscription.status === 'expired' || subscription.status === 'revoked';
      if (finished && !this.locks.isLocked(subscription.id)) {
        table.remove(subscription.id);
        pruned++;
        console.log(`[Sweep] Pruned ${subscription.status} subscription ${subscription.id}`);
      }
    }

    if (due.length > 0 || pruned > 0) {
      console.log(`[Sweep] Renewed ${renewed}/${due.length}, pruned ${pruned}`);
    }
    return table.list();
  }

  private retryOptions(label: string): RetryOptions {
    return {
      retries: this.options.retries,
      baseDelayMs: this.options.retryBaseDelayMs,
      label,
      isRetryable: isRetryableControlError,
    };
  }
}
