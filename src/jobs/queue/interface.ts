import type { Job, DigestJobPayload } from "../types.js";

export interface RetryScheduling {
  delayMs: number;
  payload?: DigestJobPayload;
}

export interface QueueStats {
  pending: number;
  running: number;
  completed: number;
  failed: number;
  dropped: number;
  capacity: number;
}

export interface JobQueue {
  /** Returns the job id, or null when the queue is full or closed */
  enqueue(payload: DigestJobPayload, maxAttempts?: number): number | null;
  claim(): Job | null;
  complete(jobId: number): void;
  fail(jobId: number, errorMessage: string): void;
  retry(jobId: number, errorMessage: string, scheduling: RetryScheduling): void;
  /** Stop accepting jobs and drop everything still pending */
  close(): Job[];
  stats(): QueueStats;
}
