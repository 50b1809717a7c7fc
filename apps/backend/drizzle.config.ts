import { defineConfig } from "drizzle-kit"

export default defineConfig({
  schema: "./database/schema.ts",
  out: "./database/migrations",
  dialect: "sqlite",
  dbCredentials: {
    url: process.env.DATABASE_PATH ?? "./data/juridiskporten.db",
  },
  migrations: {
    // Must match MIGRATIONS_TABLE in src/lib/database.ts
    table: "drizzle_migrations",
  },
})
