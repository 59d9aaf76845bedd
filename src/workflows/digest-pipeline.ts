/**
 * Digest Pipeline
 * fetch → summarize → deliver, shared by push intake, the poller and manual runs
 */

import { errorKindOf, errorMessage, isRecoverable } from "../lib/errors.js";
import { sliceText } from "../lib/text.js";
import type {
  DigestContext,
  DigestResult,
  MailGateway,
  MessageRecord,
  NotificationSink,
  Summarizer,
} from "../shared/types/api.js";
import type { DigestLog } from "../services/digests/log.js";
import { heuristicSummary } from "../services/summarizer/heuristic.js";

export interface DigestPipelineOptions {
  gateway: MailGateway;
  summarizer: Summarizer;
  sink: NotificationSink;
  log?: DigestLog;
  /** Body characters handed to the summarizer */
  maxInputChars: number;
}

/**
 * Cut to at most maxLength characters, the last one being "…"
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  if (maxLength <= 1) return "…".slice(0, maxLength);
  return `${sliceText(text, maxLength - 1)}…`;
}

export function formatDigest(message: MessageRecord, summary: string, maxLength: number): string {
  return truncateText(`New email: ${message.subject}\nFrom: ${message.sender}\n\n${summary}`, maxLength);
}

function failureOf(error: unknown): DigestResult["failure"] {
  return {
    kind: errorKindOf(error),
    message: errorMessage(error),
    retryable: isRecoverable(error),
  };
}

export class DigestPipeline {
  constructor(private readonly options: DigestPipelineOptions) {}

  /**
   * Produce and deliver the digest for one message. Never throws; every
   * outcome is a DigestResult and is written to the digest log.
   */
  async process(messageId: string, context: DigestContext = { source: "manual" }): Promise<DigestResult> {
    if (context.changeType === "deleted") {
      return this.finish({ sourceMessageId: messageId, summaryText: null, deliveryStatus: "skipped" }, context);
    }

    let message: MessageRecord;
    try {
      message = await this.options.gateway.getById(messageId);
    } catch (error) {
      return this.finish(
        { sourceMessageId: messageId, summaryText: null, deliveryStatus: "failed", failure: failureOf(error) },
        context
      );
    }

    const summary = await this.summarize(message);
    const text = formatDigest(message, summary, this.options.sink.maxLength);
    return this.deliver(messageId, text, context);
  }

  /**
   * Send an already formatted digest. Used by retries of failed deliveries,
   * which must not fetch or summarize again.
   */
  async deliver(messageId: string, text: string, context: DigestContext = { source: "manual" }): Promise<DigestResult> {
    const digest = truncateText(text, this.options.sink.maxLength);

    try {
      await this.options.sink.send(digest);
    } catch (error) {
      return this.finish(
        { sourceMessageId: messageId, summaryText: digest, deliveryStatus: "failed", failure: failureOf(error) },
        context
      );
    }

    return this.finish({ sourceMessageId: messageId, summaryText: digest, deliveryStatus: "delivered" }, context);
  }

  private async summarize(message: MessageRecord): Promise<string> {
    const { summarizer, maxInputChars } = this.options;
    const input = {
      subject: message.subject,
      sender: message.sender,
      text: sliceText(message.bodyText, maxInputChars),
    };

    try {
      const summary = (await summarizer.summarize(input)).trim();
      if (summary) return summary;
      console.warn(`[Digest] Summarizer ${summarizer.name} returned nothing for message ${message.id}, using preview`);
    } catch (error) {
      console.warn(
        `[Digest] Summarizer ${summarizer.name} failed for message ${message.id}: ${errorMessage(error)}. Using preview`
      );
    }

    return heuristicSummary(input.text);
  }

  private finish(result: DigestResult, context: DigestContext): DigestResult {
    const id = result.sourceMessageId;

    if (result.deliveryStatus === "delivered") {
      console.log(`[Digest] Delivered message ${id} via ${this.options.sink.name} (${context.source})`);
    } else if (result.deliveryStatus === "skipped") {
      console.log(`[Digest] Skipped message ${id} (${context.changeType ?? "no change type"})`);
    } else {
      console.error(`[Digest] Message ${id} failed (${result.failure?.kind ?? "unknown"}): ${result.failure?.message ?? ""}`);
    }

    try {
      this.options.log?.record(result, context);
    } catch (error) {
      console.error(`[Digest] Could not write digest log entry for message ${id}:`, error);
    }

    return result;
  }
}
