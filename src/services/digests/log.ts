import { and, desc, eq, lt } from 'drizzle-orm';
import type { AppDatabase } from '../../db/index.js';
import { digestLog, type DigestLogRow } from '../../db/schema.js';
import type { DigestContext, DigestResult } from '../../shared/types/api.js';

export interface DigestLogEntry {
  id: number;
  messageId: string;
  subscriptionId: string | null;
  source: DigestContext['source'];
  status: DigestResult['deliveryStatus'];
  summaryText: string | null;
  errorKind: string | null;
  errorMessage: string | null;
  createdAt: string;
}

/**
 * Append-only record of digest results
 */
export interface DigestLog {
  record(result: DigestResult, context: DigestContext): void;
  hasDelivered(messageId: string): boolean;
  recent(limit: number): DigestLogEntry[];
  /** Delete entries older than the given number of days; returns the count */
  cleanup(daysOld: number): number;
}

export class SqliteDigestLog implements DigestLog {
  constructor(
    private readonly db: AppDatabase,
    private readonly now: () => Date = () => new Date()
  ) {}

  record(result: DigestResult, context: DigestContext): void {
    this.db
      .insert(digestLog)
      .values({
        messageId: result.sourceMessageId,
        subscriptionId: context.subscriptionId ?? null,
        source: context.source,
        status: result.deliveryStatus,
        summaryText: result.summaryText,
        errorKind: result.failure?.kind ?? null,
        errorMessage: result.failure?.message ?? null,
        createdAt: this.now().toISOString(),
      })
      .run();
  }

  hasDelivered(messageId: string): boolean {
    const row = this.db
      .select({ id: digestLog.id })
      .from(digestLog)
      .where(and(eq(digestLog.messageId, messageId), eq(digestLog.status, 'delivered')))
      .limit(1)
      .get();
    return row !== undefined;
  }

  recent(limit: number): DigestLogEntry[] {
    return this.db
      .select()
      .from(digestLog)
      .orderBy(desc(digestLog.createdAt), desc(digestLog.id))
      .limit(limit)
      .all()
      .map(toEntry);
  }

  cleanup(daysOld: number): number {
    const cutoff = new Date(this.now().getTime() - daysOld * 24 * 60 * 60 * 1000).toISOString();
    const result = this.db.delete(digestLog).where(lt(digestLog.createdAt, cutoff)).run();
    return result.changes;
  }
}

function toEntry(row: DigestLogRow): DigestLogEntry {
  return {
    id: row.id,
    messageId: row.messageId,
    subscriptionId: row.subscriptionId,
    source: row.source,
    status: row.status,
    summaryText: row.summaryText,
    errorKind: row.errorKind,
    errorMessage: row.errorMessage,
    createdAt: row.createdAt,
  };
}
