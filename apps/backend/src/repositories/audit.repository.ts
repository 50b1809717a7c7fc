import * as schema from "@database/schema"
import type Database from "better-sqlite3"
import { and, asc, eq, gte, lte, type SQL } from "drizzle-orm"
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3"
import type { LoggingLevel } from "@/constants/env.constants"
import type {
  AccessOutcome,
  DenialReason,
} from "@/constants/subscription.constants"
import { DrizzleLogger } from "@/lib/logger"

export interface AccessAttempt {
  id: number
  userId: string
  packageId: string | null
  subscriptionId: string | null
  attemptedAt: Date
  outcome: AccessOutcome
  denialReason: DenialReason | null
  ipAddress: string | null
  userAgent: string
}

export type NewAccessAttempt = Omit<AccessAttempt, "id">

export interface AccessAttemptFilter {
  userId?: string
  packageId?: string
  outcome?: AccessOutcome
  from?: Date
  to?: Date
  limit: number
}

export interface AuditRepositoryDeps {
  DB: Database.Database
  LOGGING: LoggingLevel
}

/**
 * Append-only store of access attempts. No update or delete is offered;
 * the table's triggers reject both.
 */
export class AuditRepository {
  private db: BetterSQLite3Database<typeof schema>

  constructor(deps: AuditRepositoryDeps) {
    this.db = drizzle(deps.DB, {
      schema,
      logger:
        deps.LOGGING === "verbose"
          ? new DrizzleLogger("audit.repository")
          : undefined,
    })
  }

  private toAttemptDomain(row: schema.AccessAttemptRow): AccessAttempt {
    return {
      ...row,
      attemptedAt: new Date(row.attemptedAt),
    }
  }

  /**
   * Writes one attempt synchronously and returns its id
   */
  async insert(attempt: NewAccessAttempt): Promise<number> {
    const result = this.db
      .insert(schema.accessAttempts)
      .values({ ...attempt, attemptedAt: attempt.attemptedAt.toISOString() })
      .run()

    return Number(result.lastInsertRowid)
  }

  /**
   * Attempts matching the filter, oldest first (time, then insertion order)
   */
  async query(filter: AccessAttemptFilter): Promise<AccessAttempt[]> {
    const conditions: SQL[] = []
    if (filter.userId !== undefined) {
      conditions.push(eq(schema.accessAttempts.userId, filter.userId))
    }
    if (filter.packageId !== undefined) {
      conditions.push(eq(schema.accessAttempts.packageId, filter.packageId))
    }
    if (filter.outcome !== undefined) {
      conditions.push(eq(schema.accessAttempts.outcome, filter.outcome))
    }
    if (filter.from !== undefined) {
      conditions.push(
        gte(schema.accessAttempts.attemptedAt, filter.from.toISOString()),
      )
    }
    if (filter.to !== undefined) {
      conditions.push(
        lte(schema.accessAttempts.attemptedAt, filter.to.toISOString()),
      )
    }

    const rows = this.db
      .select()
      .from(schema.accessAttempts)
      .where(and(...conditions))
      .orderBy(
        asc(schema.accessAttempts.attemptedAt),
        asc(schema.accessAttempts.id),
      )
      .limit(filter.limit)
      .all()

    return rows.map((row) => this.toAttemptDomain(row))
  }
}
