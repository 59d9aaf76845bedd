import { errorKindOf, errorMessage } from "../lib/errors.js";
import type { LifecycleTriggers } from "../services/intake/notification-intake.js";
import type { DigestLog } from "../services/digests/log.js";
import type { SubscriptionManager } from "../services/subscriptions/manager.js";
import type { Poller } from "../workflows/poller.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SchedulerOptions {
  manager: Pick<SubscriptionManager, "sweep" | "ensure">;
  poller: Pick<Poller, "poll">;
  digestLog: Pick<DigestLog, "cleanup">;
  /** Watched resource in push mode; absent when push is off */
  pushResource?: string;
  pollingEnabled: boolean;
  sweepIntervalMs: number;
  pollIntervalMs: number;
  retentionDays: number;
}

export class Scheduler implements LifecycleTriggers {
  private intervals: NodeJS.Timeout[] = [];
  private running = false;

  constructor(private readonly options: SchedulerOptions) {}

  start() {
    if (this.running) {
      console.warn("Scheduler already running");
      return;
    }

    this.running = true;
    console.log("Starting scheduler");

    if (this.options.pushResource) {
      this.intervals.push(setInterval(() => void this.sweepNow("interval"), this.options.sweepIntervalMs));
    }

    if (this.options.pollingEnabled) {
      this.intervals.push(setInterval(() => void this.pollNow("interval"), this.options.pollIntervalMs));
    }

    // Digest log cleanup - daily
    this.intervals.push(setInterval(() => this.cleanupDigestLog(), DAY_MS));

    console.log(`Scheduler started with ${this.intervals.length} periodic tasks`);
  }

  stop() {
    if (!this.running) {
      return;
    }

    console.log("Stopping scheduler");
    this.running = false;

    for (const interval of this.intervals) {
      clearInterval(interval);
    }

    this.intervals = [];
  }

  triggerSweep(reason: string): void {
    void this.sweepNow(reason);
  }

  triggerPoll(reason: string): void {
    void this.pollNow(reason);
  }

  /**
   * Sweep, then make sure the watched resource still has a usable subscription.
   * While push is down each tick polls instead, so no mail waits for the
   * subscription to come back. Failures are logged; the next interval tries again.
   */
  async sweepNow(reason: string): Promise<void> {
    console.log(`[Scheduler] Running subscription sweep (${reason})`);

    try {
      await this.options.manager.sweep();
    } catch (error) {
      console.error(`[Scheduler] Subscription sweep failed (${errorKindOf(error)}): ${errorMessage(error)}`);
    }

    const resource = this.options.pushResource;
    if (!resource) {
      return;
    }

    try {
      await this.options.manager.ensure(resource);
    } catch (error) {
      console.error(
        `[Scheduler] No usable subscription for ${resource} (${errorKindOf(error)}): ${errorMessage(error)}`
      );
      await this.pollNow("push unavailable");
    }
  }

  async pollNow(reason: string): Promise<void> {
    console.log(`[Scheduler] Running poll (${reason})`);

    try {
      await this.options.poller.poll();
    } catch (error) {
      console.error(`[Scheduler] Poll failed (${errorKindOf(error)}): ${errorMessage(error)}`);
    }
  }

  cleanupDigestLog(): number {
    try {
      const deleted = this.options.digestLog.cleanup(this.options.retentionDays);
      console.log(`[Scheduler] Deleted ${deleted} old digest log entries`);
      return deleted;
    } catch (error) {
      console.error("[Scheduler] Digest log cleanup failed:", error);
      return 0;
    }
  }
}
