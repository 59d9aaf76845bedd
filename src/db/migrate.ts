import Database from "better-sqlite3";
import { existsSync, readFileSync } from "fs";
import { join, dirname, resolve } from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// src/db when run from sources, dist/src/db when built
const MIGRATION_CANDIDATES = [
  join(__dirname, "../../drizzle/0000_init.sql"),
  join(__dirname, "../../../drizzle/0000_init.sql"),
];

function findMigration(): string {
  const path = MIGRATION_CANDIDATES.find((candidate) => existsSync(candidate));
  if (!path) {
    throw new Error(`Migration file not found (looked in ${MIGRATION_CANDIDATES.join(", ")})`);
  }
  return path;
}

export function applyMigrations(db: Database.Database): void {
  db.exec(readFileSync(findMigration(), "utf-8"));
}

export function runMigrations(dbPath: string) {
  const db = new Database(dbPath);
  db.pragma("foreign_keys = ON");

  applyMigrations(db);
  console.log("Database migrations applied successfully");

  db.close();
}

// Run migrations if called directly
if (process.argv[1] && resolve(process.argv[1]) === __filename) {
  const dbPath = process.env.DATABASE_URL || "./data/inbox-digest.db";
  runMigrations(dbPath);
}
