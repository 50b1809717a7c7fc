import type Database from "better-sqlite3"
import type { LoggingLevel } from "@/constants/env.constants"
import type { Clock } from "@/lib/clock"
import type { KeyedLock } from "@/lib/keyed-lock"

/**
 * Process-wide dependencies, created once at startup and handed to the Hono
 * app as bindings (ctx.env). Services and repositories pick what they need.
 */
export interface AppEnv {
  DB: Database.Database
  STAGE: string
  LOGGING: LoggingLevel
  PAYMENT_WEBHOOK_SECRET: string
  ACTIVATION_LOCKS: KeyedLock
  ACTIVATION_LOCK_TIMEOUT_MS: number
  CLOCK: Clock
}
