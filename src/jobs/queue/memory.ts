import type { Job, DigestJobPayload } from "../types.js";
import type { JobQueue, QueueStats, RetryScheduling } from "./interface.js";

interface Entry {
  job: Job;
  availableAt: number;
}

export interface MemoryJobQueueOptions {
  capacity: number;
  maxAttempts?: number;
  now?: () => number;
}

/**
 * Bounded in-process job queue. Nothing survives a restart: pending jobs are
 * dropped on close, and the poller picks up undelivered messages after start-up.
 *
 * Capacity counts pending jobs; retries of accepted jobs are always requeued.
 */
export class MemoryJobQueue implements JobQueue {
  private pending: Entry[] = [];
  private running = new Map<number, Job>();
  private nextId = 1;
  private closed = false;
  private counters = { completed: 0, failed: 0, dropped: 0 };
  private readonly now: () => number;

  constructor(private readonly options: MemoryJobQueueOptions) {
    this.now = options.now ?? Date.now;
  }

  enqueue(payload: DigestJobPayload, maxAttempts = this.options.maxAttempts ?? 3): number | null {
    if (this.closed || this.pending.length >= this.options.capacity) {
      return null;
    }

    const job: Job = {
      id: this.nextId++,
      payload,
      status: "pending",
      attempts: 0,
      maxAttempts,
      errorMessage: null,
      createdAt: new Date(this.now()).toISOString(),
      startedAt: null,
      completedAt: null,
    };
    this.pending.push({ job, availableAt: this.now() });
    return job.id;
  }

  claim(): Job | null {
    const now = this.now();
    const index = this.pending.findIndex((entry) => entry.availableAt <= now);
    if (index === -1) {
      return null;
    }

    const [{ job }] = this.pending.splice(index, 1);
    job.status = "running";
    job.startedAt = new Date(now).toISOString();
    this.running.set(job.id, job);
    return job;
  }

  complete(jobId: number): void {
    const job = this.take(jobId);
    if (!job) return;

    job.status = "completed";
    job.completedAt = new Date(this.now()).toISOString();
    this.counters.completed++;
  }

  fail(jobId: number, errorMessage: string): void {
    const job = this.take(jobId);
    if (!job) return;

    job.status = "failed";
    job.errorMessage = errorMessage;
    job.attempts++;
    job.completedAt = new Date(this.now()).toISOString();
    this.counters.failed++;
  }

  retry(jobId: number, errorMessage: string, scheduling: RetryScheduling): void {
    const job = this.take(jobId);
    if (!job) return;

    if (this.closed) {
      job.status = "failed";
      job.errorMessage = errorMessage;
      this.counters.dropped++;
      return;
    }

    job.status = "pending";
    job.errorMessage = errorMessage;
    job.attempts++;
    job.startedAt = null;
    if (scheduling.payload) {
      job.payload = scheduling.payload;
    }
    this.pending.push({ job, availableAt: this.now() + scheduling.delayMs });
  }

  close(): Job[] {
    this.closed = true;
    const dropped = this.pending.map((entry) => entry.job);
    this.pending = [];
    this.counters.dropped += dropped.length;
    return dropped;
  }

  stats(): QueueStats {
    return {
      pending: this.pending.length,
      running: this.running.size,
      ...this.counters,
      capacity: this.options.capacity,
    };
  }

  private take(jobId: number): Job | undefined {
    const job = this.running.get(jobId);
    this.running.delete(jobId);
    return job;
  }
}
