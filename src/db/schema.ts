import { sqliteTable, text, integer, index } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// Push subscriptions tracked by this process (persisted for crash recovery)
export const subscriptions = sqliteTable(
  "subscriptions",
  {
    id: text("id").primaryKey(),
    resource: text("resource").notNull(),
    changeType: text("change_type").notNull().default("created"),
    // Encrypted when a storage key is configured
    clientState: text("client_state").notNull(),
    expiration: text("expiration").notNull(),
    issuedAt: text("issued_at").notNull(),
    status: text("status", {
      enum: ["pending", "active", "expiring", "expired", "revoked"],
    })
      .notNull()
      .default("active"),
    createdAt: text("created_at")
      .notNull()
      .default(sql`(datetime('now'))`),
    updatedAt: text("updated_at")
      .notNull()
      .default(sql`(datetime('now'))`),
  },
  (table) => ({
    resourceIdx: index("subscriptions_resource_idx").on(table.resource),
  })
);

// One row per digest result
export const digestLog = sqliteTable(
  "digest_log",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    messageId: text("message_id").notNull(),
    subscriptionId: text("subscription_id"),
    source: text("source", { enum: ["push", "poll", "manual"] }).notNull(),
    status: text("status", { enum: ["delivered", "failed", "skipped"] }).notNull(),
    summaryText: text("summary_text"),
    errorKind: text("error_kind"),
    errorMessage: text("error_message"),
    createdAt: text("created_at")
      .notNull()
      .default(sql`(datetime('now'))`),
  },
  (table) => ({
    messageIdx: index("digest_log_message_idx").on(table.messageId, table.status),
    createdIdx: index("digest_log_created_idx").on(table.createdAt),
  })
);

export type SubscriptionRow = typeof subscriptions.$inferSelect;
export type DigestLogRow = typeof digestLog.$inferSelect;
