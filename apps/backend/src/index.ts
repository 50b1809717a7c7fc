import { mkdirSync } from "node:fs"
import path from "node:path"
import { serve } from "@hono/node-server"
import app from "@/api/main"
import { loadConfig } from "@/constants/env.constants"
import { systemClock } from "@/lib/clock"
import { migrateDatabase, openDatabase } from "@/lib/database"
import { KeyedLock } from "@/lib/keyed-lock"
import { configureLogging, createLogger } from "@/lib/logger"
import type { AppEnv } from "@/types/app.env"

const logger = createLogger("server")

function main(): void {
  const config = loadConfig(process.env)

  configureLogging(config.LOGGING)

  if (config.DATABASE_PATH !== ":memory:") {
    mkdirSync(path.dirname(config.DATABASE_PATH), { recursive: true })
  }
  const sqlite = openDatabase(config.DATABASE_PATH)
  migrateDatabase(sqlite)

  const env: AppEnv = {
    DB: sqlite,
    STAGE: config.STAGE,
    LOGGING: config.LOGGING,
    PAYMENT_WEBHOOK_SECRET: config.PAYMENT_WEBHOOK_SECRET,
    ACTIVATION_LOCKS: new KeyedLock(),
    ACTIVATION_LOCK_TIMEOUT_MS: config.ACTIVATION_LOCK_TIMEOUT_MS,
    CLOCK: systemClock,
  }

  const server = serve(
    {
      fetch: (request) => app.fetch(request, env),
      port: config.PORT,
    },
    (info) => {
      logger.info("Server listening", {
        port: info.port,
        stage: config.STAGE,
        database: config.DATABASE_PATH,
      })
    },
  )

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal })
    server.close((error) => {
      if (error) {
        logger.error("Server close failed", error)
      }
      sqlite.close()
      process.exit(error ? 1 : 0)
    })
  }

  process.once("SIGINT", () => shutdown("SIGINT"))
  process.once("SIGTERM", () => shutdown("SIGTERM"))
}

try {
  main()
} catch (error) {
  logger.error("Startup failed", error)
  process.exit(1)
}
