import type { Subscription, SubscriptionStatus } from '../../shared/types/api.js';
import { isDueForRenewal, isPastExpiration, type RenewalPolicy } from './policy.js';
import type { SubscriptionStore } from './repository.js';

export type SubscriptionPatch = Partial<Pick<Subscription, 'expiration' | 'issuedAt' | 'status'>>;

/**
 * In-memory subscription table keyed by id, written through to a store.
 *
 * Reads report the effective status: an active record inside its renewal
 * window reads as expiring, anything past its expiration reads as expired.
 * Every read returns a copy.
 */
export class SubscriptionTable {
  private readonly records = new Map<string, Subscription>();

  constructor(
    private readonly store: SubscriptionStore,
    private readonly policy: RenewalPolicy,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Replace the table contents with the persisted records */
  load(): number {
    this.records.clear();
    for (const record of this.store.loadAll()) {
      this.records.set(record.id, record);
    }
    return this.records.size;
  }

  get(id: string): Subscription | undefined {
    const record = this.records.get(id);
    return record ? this.view(record) : undefined;
  }

  list(): Subscription[] {
    return [...this.records.values()].map((record) => this.view(record));
  }

  get size(): number {
    return this.records.size;
  }

  put(subscription: Subscription): Subscription {
    const record = { ...subscription };
    this.records.set(record.id, record);
    this.store.save(record);
    return this.view(record);
  }

  update(id: string, patch: SubscriptionPatch): Subscription | undefined {
    const current = this.records.get(id);
    if (!current) return undefined;
    return this.put({ ...current, ...patch });
  }

  remove(id: string): boolean {
    const existed = this.records.delete(id);
    if (existed) {
      this.store.delete(id);
    }
    return existed;
  }

  private view(record: Subscription): Subscription {
    return { ...record, status: this.effectiveStatus(record) };
  }

  private effectiveStatus(record: Subscription): SubscriptionStatus {
    if (record.status !== 'active' && record.status !== 'expiring') {
      return record.status;
    }

    const now = this.now();
    if (isPastExpiration(record, now)) return 'expired';
    if (isDueForRenewal(record, this.policy, now)) return 'expiring';
    return record.status;
  }
}
