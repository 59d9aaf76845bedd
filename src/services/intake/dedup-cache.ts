export interface DedupCacheOptions {
  windowMs: number;
  maxEntries: number;
  now?: () => number;
}

/**
 * Bounded TTL set of recently seen keys.
 * Entries are kept in insertion order, which is also expiry order, so both
 * expiry and overflow eviction drop from the front.
 */
export class DedupCache {
  private readonly entries = new Map<string, number>();
  private readonly now: () => number;

  constructor(private readonly options: DedupCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Check-and-insert in one step. True when the key was not seen within the
   * window (and is now recorded), false for a duplicate.
   */
  tryClaim(key: string): boolean {
    const now = this.now();
    this.evictExpired(now);

    if (this.entries.has(key)) {
      return false;
    }

    this.entries.set(key, now + this.options.windowMs);
    while (this.entries.size > this.options.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    return true;
  }

  /** Forget a claimed key so a redelivery is processed */
  release(key: string): void {
    this.entries.delete(key);
  }

  has(key: string): boolean {
    this.evictExpired(this.now());
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  private evictExpired(now: number): void {
    for (const [key, expiresAt] of this.entries) {
      if (expiresAt > now) break;
      this.entries.delete(key);
    }
  }
}

export function dedupKey(event: { subscriptionId: string; resourceId: string; changeType: string }): string {
  return `${event.subscriptionId}:${event.resourceId}:${event.changeType}`;
}
