/**
 * Poller
 * Degraded-mode substitute for push: lists unread messages and runs the
 * digest pipeline for each one not delivered yet.
 */

import type { DigestResult, MailGateway } from "../shared/types/api.js";
import type { DigestLog } from "../services/digests/log.js";
import type { DigestPipeline } from "./digest-pipeline.js";

export interface PollerOptions {
  gateway: MailGateway;
  pipeline: Pick<DigestPipeline, "process">;
  log: Pick<DigestLog, "hasDelivered">;
  folder: string;
  maxMessages: number;
}

export interface PollSummary {
  listed: number;
  alreadyDelivered: number;
  results: DigestResult[];
}

export class Poller {
  private inProgress = false;

  constructor(private readonly options: PollerOptions) {}

  get running(): boolean {
    return this.inProgress;
  }

  /**
   * Returns null when a poll is already running. Listing failures propagate.
   */
  async poll(): Promise<PollSummary | null> {
    if (this.inProgress) {
      console.log("[Poller] Poll already in progress, skipping");
      return null;
    }

    this.inProgress = true;
    try {
      const { gateway, pipeline, log, folder, maxMessages } = this.options;
      const messages = await gateway.listUnread(folder, maxMessages);
      const results: DigestResult[] = [];
      let alreadyDelivered = 0;

      for (const message of messages.slice(0, maxMessages)) {
        if (log.hasDelivered(message.id)) {
          alreadyDelivered++;
          continue;
        }
        results.push(await pipeline.process(message.id, { source: "poll", changeType: "created" }));
      }

      const delivered = results.filter((r) => r.deliveryStatus === "delivered").length;
      console.log(
        `[Poller] ${messages.length} unread, ${alreadyDelivered} already delivered, ${delivered}/${results.length} delivered now`
      );
      return { listed: messages.length, alreadyDelivered, results };
    } finally {
      this.inProgress = false;
    }
  }
}
