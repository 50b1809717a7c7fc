import type { Package } from "@/repositories/catalog.repository"
import type { AccessAttempt } from "@/repositories/audit.repository"
import type { Subscription } from "@/repositories/subscription.repository"

/**
 * JSON shapes returned by the API (snake_case, ISO-8601 timestamps)
 */

export function toSubscriptionResponse(subscription: Subscription) {
  return {
    id: subscription.id,
    user_id: subscription.userId,
    package_id: subscription.packageId,
    status: subscription.status,
    is_trial: subscription.isTrial,
    start_at: subscription.startAt.toISOString(),
    end_at: subscription.endAt?.toISOString() ?? null,
    payment_reference: subscription.paymentReference,
    superseded_by: subscription.supersededBy,
    created_at: subscription.createdAt.toISOString(),
  }
}

export function toPackageResponse(pkg: Package) {
  return {
    id: pkg.id,
    slug: pkg.slug,
    name: pkg.name,
    requires_subscription: pkg.requiresSubscription,
    is_active: pkg.isActive,
    trial_period_days: pkg.trialPeriodDays,
  }
}

export function toAccessAttemptResponse(attempt: AccessAttempt) {
  return {
    id: attempt.id,
    user_id: attempt.userId,
    package_id: attempt.packageId,
    subscription_id: attempt.subscriptionId,
    attempted_at: attempt.attemptedAt.toISOString(),
    outcome: attempt.outcome,
    denial_reason: attempt.denialReason,
    ip_address: attempt.ipAddress,
    user_agent: attempt.userAgent,
  }
}
