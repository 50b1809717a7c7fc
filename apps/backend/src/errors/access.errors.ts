import type { SubscriptionStatus } from "@/constants/subscription.constants"
import { type ErrorDetails, ErrorCode, HTTPError } from "@/errors/http.errors"
import type { ContentfulStatusCode } from "hono/utils/http-status"

/**
 * Typed failures raised by the access core (repositories and services).
 * The web layer translates them with toHTTPError().
 */

export enum AccessErrorCode {
  NOT_FOUND = "NOT_FOUND",
  CONFLICT = "CONFLICT",
  INVALID_TRANSITION = "INVALID_TRANSITION",
  TRIAL_UNAVAILABLE = "TRIAL_UNAVAILABLE",
  AUDIT_WRITE_FAULT = "AUDIT_WRITE_FAULT",
}

export type EntityKind = "user" | "package" | "subscription"

export class AccessError extends Error {
  constructor(
    message: string,
    public code: AccessErrorCode,
    public cause?: unknown,
  ) {
    super(message)
    this.name = "AccessError"
    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

export class NotFoundError extends AccessError {
  constructor(
    public entity: EntityKind,
    public entityId: string,
  ) {
    super(`${entity} '${entityId}' not found`, AccessErrorCode.NOT_FOUND)
    this.name = "NotFoundError"
  }
}

/**
 * Concurrent activation for the same (user, package) pair, or an
 * activation the current state forbids. Callers may retry with backoff.
 */
export class ConflictError extends AccessError {
  constructor(
    message: string,
    public details: { userId?: string; packageId?: string } = {},
    cause?: unknown,
  ) {
    super(message, AccessErrorCode.CONFLICT, cause)
    this.name = "ConflictError"
  }
}

/**
 * The user already held the package, so no trial can start. Permanent;
 * retrying does not help.
 */
export class TrialUnavailableError extends AccessError {
  constructor(
    public userId: string,
    public packageId: string,
  ) {
    super(
      "A trial is only available before any subscription",
      AccessErrorCode.TRIAL_UNAVAILABLE,
    )
    this.name = "TrialUnavailableError"
  }
}

export class InvalidTransitionError extends AccessError {
  constructor(
    public subscriptionId: string,
    public from: SubscriptionStatus,
    public to: SubscriptionStatus,
  ) {
    super(
      `Subscription '${subscriptionId}' cannot move from ${from} to ${to}`,
      AccessErrorCode.INVALID_TRANSITION,
    )
    this.name = "InvalidTransitionError"
  }
}

/**
 * An access decision was made but its audit record could not be written.
 * Never surfaced to the caller of the access check; logged for operators.
 */
export class AuditWriteFault extends AccessError {
  constructor(cause: unknown) {
    super(
      `Audit record could not be written: ${cause instanceof Error ? cause.message : String(cause)}`,
      AccessErrorCode.AUDIT_WRITE_FAULT,
      cause,
    )
    this.name = "AuditWriteFault"
  }
}

/**
 * Factory functions for common access errors
 */
export const AccessErrors = {
  userNotFound: (userId: string) => new NotFoundError("user", userId),

  packageNotFound: (packageId: string) =>
    new NotFoundError("package", packageId),

  subscriptionNotFound: (subscriptionId: string) =>
    new NotFoundError("subscription", subscriptionId),

  activationInProgress: (userId: string, packageId: string, cause?: unknown) =>
    new ConflictError(
      "Another activation for this user and package is in progress",
      { userId, packageId },
      cause,
    ),

  concurrentWrite: (userId: string, packageId: string, cause?: unknown) =>
    new ConflictError(
      "A concurrent write already created a live subscription for this user and package",
      { userId, packageId },
      cause,
    ),

  trialAlreadyUsed: (userId: string, packageId: string) =>
    new TrialUnavailableError(userId, packageId),

  invalidTransition: (
    subscriptionId: string,
    from: SubscriptionStatus,
    to: SubscriptionStatus,
  ) => new InvalidTransitionError(subscriptionId, from, to),
}

export function isConflictError(error: unknown): error is ConflictError {
  return error instanceof ConflictError
}

/**
 * SQLite reports unique/primary-key violations with this code.
 * Drizzle may wrap the driver error, so the cause chain is checked too.
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof Error)) return false
  if ("code" in error) {
    const { code } = error
    if (
      code === "SQLITE_CONSTRAINT_UNIQUE" ||
      code === "SQLITE_CONSTRAINT_PRIMARYKEY"
    ) {
      return true
    }
  }
  return isUniqueViolation(error.cause)
}

const HTTP_MAPPING: Record<
  AccessErrorCode,
  { status: ContentfulStatusCode; code: ErrorCode }
> = {
  [AccessErrorCode.NOT_FOUND]: { status: 404, code: ErrorCode.NOT_FOUND },
  [AccessErrorCode.CONFLICT]: { status: 409, code: ErrorCode.CONFLICT },
  [AccessErrorCode.INVALID_TRANSITION]: {
    status: 409,
    code: ErrorCode.INVALID_TRANSITION,
  },
  [AccessErrorCode.TRIAL_UNAVAILABLE]: {
    status: 409,
    code: ErrorCode.TRIAL_UNAVAILABLE,
  },
  [AccessErrorCode.AUDIT_WRITE_FAULT]: {
    status: 500,
    code: ErrorCode.AUDIT_WRITE_FAULT,
  },
}

/**
 * Maps a domain failure to the HTTP error the API returns
 */
export function toHTTPError(error: AccessError): HTTPError {
  const { status, code } = HTTP_MAPPING[error.code]

  let details: ErrorDetails | undefined
  if (error instanceof ConflictError) {
    details = { ...error.details, retryable: true }
  } else if (error instanceof TrialUnavailableError) {
    details = { userId: error.userId, packageId: error.packageId }
  } else if (error instanceof InvalidTransitionError) {
    details = { subscriptionId: error.subscriptionId }
  }

  return new HTTPError(status, code, error.message, details)
}
