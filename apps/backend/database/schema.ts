import { sql } from "drizzle-orm"
import {
  check,
  index,
  integer,
  sqliteTable,
  text,
  uniqueIndex,
} from "drizzle-orm/sqlite-core"
import {
  AccessOutcome,
  ApiKeyRole,
  DenialReason,
  LIVE_SUBSCRIPTION_STATUSES,
  SubscriptionStatus,
  UserRole,
} from "../src/constants/subscription.constants"

// =============================================================================
// HELPERS FOR CHECK CONSTRAINTS
// =============================================================================

// Generate CHECK constraint values from enums (single source of truth)
const toSqlList = (values: readonly string[]) =>
  values.map((v) => `'${v}'`).join(", ")

const subscriptionStatusValues = toSqlList(Object.values(SubscriptionStatus))
const liveStatusValues = toSqlList(LIVE_SUBSCRIPTION_STATUSES)
const accessOutcomeValues = toSqlList(Object.values(AccessOutcome))
const denialReasonValues = toSqlList(Object.values(DenialReason))
const userRoleValues = toSqlList(Object.values(UserRole))
const apiKeyRoleValues = toSqlList(Object.values(ApiKeyRole))

// All timestamps are ISO-8601 UTC strings with milliseconds, so text
// comparison orders them chronologically.
const isoNow = sql`(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`

// =============================================================================
// CATALOG TABLES (synced in by the hosting platform)
// =============================================================================

export const users = sqliteTable(
  "users",
  {
    id: text("id").primaryKey(),
    email: text("email").notNull().unique(),
    role: text("role").$type<UserRole>().notNull().default(UserRole.CLIENT),
    createdAt: text("created_at").notNull().default(isoNow),
  },
  () => [check("role", sql.raw(`role IN (${userRoleValues})`))],
)

// requires_subscription = 0 marks a free package every user may open
export const packages = sqliteTable(
  "packages",
  {
    id: text("id").primaryKey(),
    slug: text("slug").notNull().unique(),
    name: text("name").notNull(),
    requiresSubscription: integer("requires_subscription", { mode: "boolean" })
      .notNull()
      .default(true),
    isActive: integer("is_active", { mode: "boolean" }).notNull().default(true),
    trialPeriodDays: integer("trial_period_days").notNull().default(7),
    createdAt: text("created_at").notNull().default(isoNow),
    modifiedAt: text("modified_at").notNull().default(isoNow),
  },
  () => [check("trial_period_days", sql.raw("trial_period_days >= 0"))],
)

// =============================================================================
// SUBSCRIPTION TABLES
// =============================================================================

// end_at NULL means the window is unbounded
// superseded_by: id of the activation that replaced this row
// payment_reference: external payment event id that created this row
export const subscriptions = sqliteTable(
  "subscriptions",
  {
    id: text("id").primaryKey(),
    userId: text("user_id")
      .notNull()
      .references(() => users.id),
    packageId: text("package_id")
      .notNull()
      .references(() => packages.id),
    status: text("status").$type<SubscriptionStatus>().notNull(),
    startAt: text("start_at").notNull(),
    endAt: text("end_at"),
    isTrial: integer("is_trial", { mode: "boolean" }).notNull().default(false),
    paymentReference: text("payment_reference"),
    supersededBy: text("superseded_by"),
    createdAt: text("created_at").notNull().default(isoNow),
    modifiedAt: text("modified_at").notNull().default(isoNow),
  },
  (table) => [
    index("idx_subscriptions_user_package").on(
      table.userId,
      table.packageId,
      table.startAt,
    ),
    index("idx_subscriptions_status").on(table.status),
    // At most one live subscription per (user, package)
    uniqueIndex("uq_subscriptions_live")
      .on(table.userId, table.packageId)
      .where(sql.raw(`status IN (${liveStatusValues})`)),
    check("status", sql.raw(`status IN (${subscriptionStatusValues})`)),
  ],
)

// One row per confirmed payment delivery; the primary key makes
// redelivery of the same event detectable inside the activation transaction
export const paymentEvents = sqliteTable(
  "payment_events",
  {
    eventId: text("event_id").primaryKey(),
    userId: text("user_id").notNull(),
    packageId: text("package_id").notNull(),
    durationDays: integer("duration_days").notNull(),
    subscriptionId: text("subscription_id")
      .notNull()
      .references(() => subscriptions.id),
    receivedAt: text("received_at").notNull().default(isoNow),
  },
  (table) => [index("idx_payment_events_subscription").on(table.subscriptionId)],
)

// =============================================================================
// AUDIT TABLES
// =============================================================================

// Append-only (UPDATE and DELETE are rejected by triggers).
// user_id has no foreign key so attempts by since-removed users survive.
export const accessAttempts = sqliteTable(
  "access_attempts",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    userId: text("user_id").notNull(),
    packageId: text("package_id"),
    subscriptionId: text("subscription_id"),
    attemptedAt: text("attempted_at").notNull(),
    outcome: text("outcome").$type<AccessOutcome>().notNull(),
    denialReason: text("denial_reason").$type<DenialReason>(),
    ipAddress: text("ip_address"),
    userAgent: text("user_agent").notNull().default(""),
  },
  (table) => [
    index("idx_access_attempts_user_time").on(table.userId, table.attemptedAt),
    index("idx_access_attempts_package_time").on(
      table.packageId,
      table.attemptedAt,
    ),
    check("outcome", sql.raw(`outcome IN (${accessOutcomeValues})`)),
    check(
      "denial_reason",
      sql.raw(
        `denial_reason IS NULL OR denial_reason IN (${denialReasonValues})`,
      ),
    ),
  ],
)

// =============================================================================
// AUTH TABLES
// =============================================================================

// API Keys - SHA-256 hash of the secret part (no prefix)
export const apiKeys = sqliteTable(
  "api_keys",
  {
    keyHash: text("key_hash").primaryKey(),
    label: text("label").notNull(),
    role: text("role").$type<ApiKeyRole>().notNull(),
    createdAt: text("created_at").notNull().default(isoNow),
  },
  () => [check("role", sql.raw(`role IN (${apiKeyRoleValues})`))],
)

// =============================================================================
// TYPE INFERENCE HELPERS
// =============================================================================

export type UserRow = typeof users.$inferSelect
export type NewUserRow = typeof users.$inferInsert
export type PackageRow = typeof packages.$inferSelect
export type NewPackageRow = typeof packages.$inferInsert
export type SubscriptionRow = typeof subscriptions.$inferSelect
export type NewSubscriptionRow = typeof subscriptions.$inferInsert
export type PaymentEventRow = typeof paymentEvents.$inferSelect
export type AccessAttemptRow = typeof accessAttempts.$inferSelect
export type NewAccessAttemptRow = typeof accessAttempts.$inferInsert
export type ApiKeyRow = typeof apiKeys.$inferSelect
