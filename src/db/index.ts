import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import * as schema from "./schema.js";
import { applyMigrations } from "./migrate.js";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  sqlite: Database.Database;
  close(): void;
}

/**
 * Open the SQLite database and bring the schema up to date.
 * ":memory:" gives a private in-memory database (tests).
 */
export function openDatabase(url: string): DatabaseHandle {
  if (url !== ":memory:") {
    mkdirSync(dirname(url), { recursive: true });
  }

  const sqlite = new Database(url);
  if (url !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.pragma("foreign_keys = ON");

  applyMigrations(sqlite);

  return {
    db: drizzle(sqlite, { schema }),
    sqlite,
    close: () => sqlite.close(),
  };
}

export { schema };
