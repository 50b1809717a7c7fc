/**
 * Domain constants for subscriptions, access decisions and API keys
 *
 * IMPORTANT: These values MUST match the CHECK constraints in the database schema
 * See: apps/backend/database/migrations/0000_init_access_schema.sql
 *
 * When modifying these enums:
 * 1. Run `npm run db:generate` so drizzle-kit writes the new CHECK constraints
 * 2. Ensure all values are lowercase to match DB constraints
 */

/**
 * Subscription lifecycle statuses
 *
 * TRIAL: Time-limited trial access, counts as live
 * ACTIVE: Paid access, counts as live
 * EXPIRED: End timestamp passed or superseded by a newer activation (terminal)
 * CANCELLED: Explicitly revoked (terminal)
 */
export enum SubscriptionStatus {
  ACTIVE = "active",
  TRIAL = "trial",
  EXPIRED = "expired",
  CANCELLED = "cancelled",
}

/**
 * Statuses that grant access. At most one row per (user, package) may hold one.
 */
export const LIVE_SUBSCRIPTION_STATUSES: readonly SubscriptionStatus[] = [
  SubscriptionStatus.ACTIVE,
  SubscriptionStatus.TRIAL,
]

export type SupersedeStatus =
  | SubscriptionStatus.EXPIRED
  | SubscriptionStatus.CANCELLED

export function isLiveStatus(status: SubscriptionStatus): boolean {
  return LIVE_SUBSCRIPTION_STATUSES.includes(status)
}

/**
 * trial|active -> expired|cancelled. Nothing leaves a terminal status;
 * a renewed purchase creates a new row instead.
 */
export function canTransition(
  from: SubscriptionStatus,
  to: SubscriptionStatus,
): boolean {
  if (!isLiveStatus(from)) return false
  return (
    to === SubscriptionStatus.EXPIRED || to === SubscriptionStatus.CANCELLED
  )
}

export enum AccessOutcome {
  GRANTED = "granted",
  DENIED = "denied",
}

export enum DenialReason {
  NO_SUBSCRIPTION = "no_subscription",
  EXPIRED = "expired",
  CANCELLED = "cancelled",
  NOT_STARTED = "not_started",
  PACKAGE_INACTIVE = "package_inactive",
}

export enum UserRole {
  CLIENT = "client",
  LAWYER = "lawyer",
  ADMIN = "admin",
}

/**
 * API key roles. ADMIN includes everything SERVICE may do.
 */
export enum ApiKeyRole {
  SERVICE = "service",
  ADMIN = "admin",
}

export const SUBSCRIPTION_DEFAULTS = {
  PURCHASE_DURATION_DAYS: 365,
  TRIAL_PERIOD_DAYS: 7,
} as const

// Upper bounds accepted from payment events and package syncs
export const SUBSCRIPTION_LIMITS = {
  MAX_PURCHASE_DURATION_DAYS: 36_500,
  MAX_TRIAL_PERIOD_DAYS: 365,
} as const

export const SECONDS_PER_DAY = 86_400

export function daysToSeconds(days: number): number {
  return days * SECONDS_PER_DAY
}

/**
 * End of an access window. A null duration means the window is unbounded.
 */
export function calculateEndDate(
  start: Date,
  durationInSeconds: number | null,
): Date | null {
  if (durationInSeconds === null) return null
  return new Date(start.getTime() + durationInSeconds * 1000)
}
