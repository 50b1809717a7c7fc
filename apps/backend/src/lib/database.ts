import { fileURLToPath } from "node:url"
import Database from "better-sqlite3"
import { drizzle } from "drizzle-orm/better-sqlite3"
import { migrate } from "drizzle-orm/better-sqlite3/migrator"

// Generated by drizzle-kit from database/schema.ts (see drizzle.config.ts)
export const MIGRATIONS_FOLDER = fileURLToPath(
  new URL("../../database/migrations", import.meta.url),
)
export const MIGRATIONS_TABLE = "drizzle_migrations"

/**
 * Opens the SQLite file behind the service. WAL lets readers proceed while
 * an activation transaction is writing.
 */
export function openDatabase(filename: string): Database.Database {
  const sqlite = new Database(filename)
  sqlite.pragma("journal_mode = WAL")
  sqlite.pragma("foreign_keys = ON")
  sqlite.pragma("busy_timeout = 5000")
  return sqlite
}

/**
 * Applies pending drizzle-kit migrations
 */
export function migrateDatabase(sqlite: Database.Database): void {
  migrate(drizzle(sqlite), {
    migrationsFolder: MIGRATIONS_FOLDER,
    migrationsTable: MIGRATIONS_TABLE,
  })
}
