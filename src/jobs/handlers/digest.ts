import { AppError } from "../../lib/errors.js";
import type { DigestContext } from "../../shared/types/api.js";
import type { DigestPipeline } from "../../workflows/digest-pipeline.js";
import type { Job, JobHandler } from "../types.js";

export class DigestHandler implements JobHandler {
  constructor(private readonly pipeline: Pick<DigestPipeline, "process" | "deliver">) {}

  async handle(job: Job): Promise<void> {
    const payload = job.payload;
    const context: DigestContext = {
      source: payload.source,
      subscriptionId: payload.subscriptionId,
      changeType: payload.changeType,
    };

    const result = payload.preservedDigest
      ? await this.pipeline.deliver(payload.messageId, payload.preservedDigest, context)
      : await this.pipeline.process(payload.messageId, context);

    if (result.deliveryStatus !== "failed") {
      return;
    }

    // A digest text on a failed result means only delivery failed: retry the send alone
    if (result.summaryText) {
      job.payload = { ...payload, preservedDigest: result.summaryText };
    }

    const failure = result.failure;
    throw new AppError(
      `Digest for message ${payload.messageId} failed: ${failure?.message ?? "unknown error"}`,
      failure?.kind ?? "unknown",
      failure?.retryable ?? false,
      { messageId: payload.messageId, subscriptionId: payload.subscriptionId }
    );
  }
}
