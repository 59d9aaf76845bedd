import type { ChangeType, DigestSource } from "../shared/types/api.js";

// Job status enum
export type JobStatus = "pending" | "running" | "completed" | "failed";

export interface DigestJobPayload {
  messageId: string;
  subscriptionId?: string;
  changeType: ChangeType;
  source: DigestSource;
  /** Formatted digest from an attempt whose delivery failed; retries resend it as-is */
  preservedDigest?: string;
}

// Job interface
export interface Job {
  id: number;
  payload: DigestJobPayload;
  status: JobStatus;
  attempts: number;
  maxAttempts: number;
  errorMessage: string | null;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
}

/**
 * Job handler interface. A handler signals a retryable failure by throwing a
 * recoverable AppError; it may replace job.payload first, and the retry runs
 * with the replaced payload.
 */
export interface JobHandler {
  handle(job: Job): Promise<void>;
}
