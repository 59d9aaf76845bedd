import { eq } from 'drizzle-orm';
import type { AppDatabase } from '../../db/index.js';
import { subscriptions, type SubscriptionRow } from '../../db/schema.js';
import type { SecretCodec } from '../../lib/encryption.js';
import type { Subscription, SubscriptionStatus } from '../../shared/types/api.js';

/**
 * Storage for subscription records. The table writes through on every change
 * so a restart can pick the subscriptions back up.
 */
export interface SubscriptionStore {
  loadAll(): Subscription[];
  save(subscription: Subscription): void;
  delete(id: string): void;
}

export class SqliteSubscriptionStore implements SubscriptionStore {
  constructor(
    private readonly db: AppDatabase,
    private readonly codec: SecretCodec
  ) {}

  loadAll(): Subscription[] {
    const rows = this.db.select().from(subscriptions).all();
    const loaded: Subscription[] = [];

    for (const row of rows) {
      try {
        loaded.push(this.toSubscription(row));
      } catch (error) {
        // Secret stored under a different key: the record cannot authenticate events
        console.error(`[Subscriptions] Skipping unreadable record ${row.id}:`, error);
      }
    }
    return loaded;
  }

  save(subscription: Subscription): void {
    const now = new Date().toISOString();
    const values = {
      resource: subscription.resource,
      changeType: subscription.changeType,
      clientState: this.codec.encode(subscription.clientStateSecret),
      expiration: subscription.expiration.toISOString(),
      issuedAt: subscription.issuedAt.toISOString(),
      status: subscription.status,
      updatedAt: now,
    };

    this.db
      .insert(subscriptions)
      .values({ id: subscription.id, ...values, createdAt: now })
      .onConflictDoUpdate({ target: subscriptions.id, set: values })
      .run();
  }

  delete(id: string): void {
    this.db.delete(subscriptions).where(eq(subscriptions.id, id)).run();
  }

  private toSubscription(row: SubscriptionRow): Subscription {
    const status: SubscriptionStatus = row.status;
    return {
      id: row.id,
      resource: row.resource,
      changeType: row.changeType,
      clientStateSecret: this.codec.decode(row.clientState),
      expiration: new Date(row.expiration),
      issuedAt: new Date(row.issuedAt),
      status,
    };
  }
}

/** Non-persistent store (tests, poll-only runs) */
export class MemorySubscriptionStore implements SubscriptionStore {
  private readonly records = new Map<string, Subscription>();

  loadAll(): Subscription[] {
    return [...this.records.values()].map((record) => ({ ...record }));
  }

  save(subscription: Subscription): void {
    this.records.set(subscription.id, { ...subscription });
  }

  delete(id: string): void {
    this.records.delete(id);
  }
}
