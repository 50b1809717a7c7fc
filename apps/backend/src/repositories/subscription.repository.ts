import { randomUUID } from "node:crypto"
import * as schema from "@database/schema"
import type Database from "better-sqlite3"
import { and, desc, eq, inArray, sql } from "drizzle-orm"
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3"
import type { LoggingLevel } from "@/constants/env.constants"
import {
  LIVE_SUBSCRIPTION_STATUSES,
  type SubscriptionStatus,
  type SupersedeStatus,
} from "@/constants/subscription.constants"
import { AccessErrors, isUniqueViolation } from "@/errors/access.errors"
import { DrizzleLogger } from "@/lib/logger"

export interface Subscription {
  id: string
  userId: string
  packageId: string
  status: SubscriptionStatus
  startAt: Date
  endAt: Date | null // null = unbounded
  isTrial: boolean
  paymentReference: string | null
  supersededBy: string | null
  createdAt: Date
  modifiedAt: Date
}

export interface SubscriptionRepositoryDeps {
  DB: Database.Database
  LOGGING: LoggingLevel
}

export interface PaymentEventRecord {
  eventId: string
  durationDays: number
}

export interface ActivateSubscriptionParams {
  userId: string
  packageId: string
  status: SubscriptionStatus
  startAt: Date
  endAt: Date | null
  isTrial: boolean
  supersedeAs: SupersedeStatus
  now: Date
  // Present when a payment confirmation drives the activation
  paymentEvent?: PaymentEventRecord
}

export interface ActivateSubscriptionResult {
  subscription: Subscription
  created: boolean // false when the payment event was already processed
  supersededIds: string[]
}

export interface UpdateStatusParams {
  subscriptionId: string
  from: SubscriptionStatus
  to: SubscriptionStatus
  now: Date
}

const liveStatuses = [...LIVE_SUBSCRIPTION_STATUSES]

// Breaks ties between rows written within the same millisecond
const insertionOrder = sql`rowid`

export class SubscriptionRepository {
  private db: BetterSQLite3Database<typeof schema>

  constructor(deps: SubscriptionRepositoryDeps) {
    this.db = drizzle(deps.DB, {
      schema,
      logger:
        deps.LOGGING === "verbose"
          ? new DrizzleLogger("subscription.repository")
          : undefined,
    })
  }

  /**
   * Transform database row to domain type
   */
  private toSubscriptionDomain(row: schema.SubscriptionRow): Subscription {
    return {
      id: row.id,
      userId: row.userId,
      packageId: row.packageId,
      status: row.status,
      startAt: new Date(row.startAt),
      endAt: row.endAt === null ? null : new Date(row.endAt),
      isTrial: row.isTrial,
      paymentReference: row.paymentReference,
      supersededBy: row.supersededBy,
      createdAt: new Date(row.createdAt),
      modifiedAt: new Date(row.modifiedAt),
    }
  }

  /**
   * Supersedes every live row for the pair and inserts the new live row in
   * one IMMEDIATE transaction. With a payment event, the event row is written
   * in the same transaction; a redelivered event returns the subscription the
   * first delivery created and changes nothing.
   *
   * A unique-index violation (another writer won the race) surfaces as a
   * ConflictError.
   */
  async activate(
    params: ActivateSubscriptionParams,
  ): Promise<ActivateSubscriptionResult> {
    const { userId, packageId, paymentEvent } = params
    const nowIso = params.now.toISOString()

    try {
      return this.db.transaction(
        (tx) => {
          if (paymentEvent) {
            const existing = tx
              .select({ row: schema.subscriptions })
              .from(schema.paymentEvents)
              .innerJoin(
                schema.subscriptions,
                eq(schema.paymentEvents.subscriptionId, schema.subscriptions.id),
              )
              .where(eq(schema.paymentEvents.eventId, paymentEvent.eventId))
              .get()

            if (existing) {
              return {
                subscription: this.toSubscriptionDomain(existing.row),
                created: false,
                supersededIds: [],
              }
            }
          }

          const row: schema.SubscriptionRow = {
            id: randomUUID(),
            userId,
            packageId,
            status: params.status,
            startAt: params.startAt.toISOString(),
            endAt: params.endAt === null ? null : params.endAt.toISOString(),
            isTrial: params.isTrial,
            paymentReference: paymentEvent?.eventId ?? null,
            supersededBy: null,
            createdAt: nowIso,
            modifiedAt: nowIso,
          }

          const superseded = tx
            .update(schema.subscriptions)
            .set({
              status: params.supersedeAs,
              supersededBy: row.id,
              modifiedAt: nowIso,
            })
            .where(
              and(
                eq(schema.subscriptions.userId, userId),
                eq(schema.subscriptions.packageId, packageId),
                inArray(schema.subscriptions.status, liveStatuses),
              ),
            )
            .returning({ id: schema.subscriptions.id })
            .all()

          tx.insert(schema.subscriptions).values(row).run()

          if (paymentEvent) {
            tx.insert(schema.paymentEvents)
              .values({
                eventId: paymentEvent.eventId,
                userId,
                packageId,
                durationDays: paymentEvent.durationDays,
                subscriptionId: row.id,
                receivedAt: nowIso,
              })
              .run()
          }

          return {
            subscription: this.toSubscriptionDomain(row),
            created: true,
            supersededIds: superseded.map((s) => s.id),
          }
        },
        { behavior: "immediate" },
      )
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw AccessErrors.concurrentWrite(userId, packageId, error)
      }
      throw error
    }
  }

  async getSubscription(subscriptionId: string): Promise<Subscription | null> {
    const row = this.db
      .select()
      .from(schema.subscriptions)
      .where(eq(schema.subscriptions.id, subscriptionId))
      .get()

    return row ? this.toSubscriptionDomain(row) : null
  }

  /**
   * Live rows for the pair, most recently started first
   */
  async findLive(userId: string, packageId: string): Promise<Subscription[]> {
    const rows = this.db
      .select()
      .from(schema.subscriptions)
      .where(
        and(
          eq(schema.subscriptions.userId, userId),
          eq(schema.subscriptions.packageId, packageId),
          inArray(schema.subscriptions.status, liveStatuses),
        ),
      )
      .orderBy(
        desc(schema.subscriptions.startAt),
        desc(schema.subscriptions.createdAt),
        desc(insertionOrder),
      )
      .all()

    return rows.map((row) => this.toSubscriptionDomain(row))
  }

  /**
   * Every row for the pair, whatever its status, most recent first
   */
  async findForPair(userId: string, packageId: string): Promise<Subscription[]> {
    const rows = this.db
      .select()
      .from(schema.subscriptions)
      .where(
        and(
          eq(schema.subscriptions.userId, userId),
          eq(schema.subscriptions.packageId, packageId),
        ),
      )
      .orderBy(
        desc(schema.subscriptions.createdAt),
        desc(schema.subscriptions.startAt),
        desc(insertionOrder),
      )
      .all()

    return rows.map((row) => this.toSubscriptionDomain(row))
  }

  async listForUser(userId: string): Promise<Subscription[]> {
    const rows = this.db
      .select()
      .from(schema.subscriptions)
      .where(eq(schema.subscriptions.userId, userId))
      .orderBy(
        desc(schema.subscriptions.createdAt),
        desc(schema.subscriptions.startAt),
        desc(insertionOrder),
      )
      .all()

    return rows.map((row) => this.toSubscriptionDomain(row))
  }

  async listLiveForUser(userId: string): Promise<Subscription[]> {
    const rows = this.db
      .select()
      .from(schema.subscriptions)
      .where(
        and(
          eq(schema.subscriptions.userId, userId),
          inArray(schema.subscriptions.status, liveStatuses),
        ),
      )
      .orderBy(schema.subscriptions.packageId)
      .all()

    return rows.map((row) => this.toSubscriptionDomain(row))
  }

  /**
   * Compare-and-set on status. Returns false when the row no longer holds
   * the expected status (a concurrent transition won).
   */
  async updateStatus(params: UpdateStatusParams): Promise<boolean> {
    const result = this.db
      .update(schema.subscriptions)
      .set({ status: params.to, modifiedAt: params.now.toISOString() })
      .where(
        and(
          eq(schema.subscriptions.id, params.subscriptionId),
          eq(schema.subscriptions.status, params.from),
        ),
      )
      .run()

    return result.changes > 0
  }
}
