import {
  AccessOutcome,
  DenialReason,
  isLiveStatus,
  SubscriptionStatus,
} from "@/constants/subscription.constants"
import { AccessErrors } from "@/errors/access.errors"
import {
  CatalogRepository,
  type CatalogRepositoryDeps,
  type Package,
} from "@/repositories/catalog.repository"
import {
  type Subscription,
  SubscriptionRepository,
  type SubscriptionRepositoryDeps,
} from "@/repositories/subscription.repository"

export interface AccessEvaluatorDeps
  extends CatalogRepositoryDeps,
    SubscriptionRepositoryDeps {}

export type AccessDecision =
  | {
      outcome: AccessOutcome.GRANTED
      subscription: Subscription | null // null for packages open to everyone
      liveCount: number
    }
  | {
      outcome: AccessOutcome.DENIED
      reason: DenialReason
      subscription: Subscription | null
      liveCount: number
    }

export interface DecideAccessParams {
  pkg: Pick<Package, "requiresSubscription" | "isActive">
  subscriptions: readonly Subscription[]
  now: Date
}

const byStartDesc = (a: Subscription, b: Subscription) =>
  b.startAt.getTime() - a.startAt.getTime()

const byCreatedDesc = (a: Subscription, b: Subscription) =>
  b.createdAt.getTime() - a.createdAt.getTime()

/**
 * Decides access from a package and every subscription row for the pair.
 *
 * - inactive package: denied, package_inactive
 * - package without subscription requirement: granted
 * - live row whose start is after now: denied, not_started
 * - live row with end <= now: denied, expired (the row is returned so the
 *   caller can transition it)
 * - no live row: the latest row decides between expired, cancelled and
 *   no_subscription
 *
 * With more than one live row the most recently started one wins and
 * liveCount reports the anomaly.
 */
export function decideAccess(params: DecideAccessParams): AccessDecision {
  const { pkg, now } = params
  const live = params.subscriptions
    .filter((s) => isLiveStatus(s.status))
    .sort(byStartDesc)
  const liveCount = live.length

  if (!pkg.isActive) {
    return {
      outcome: AccessOutcome.DENIED,
      reason: DenialReason.PACKAGE_INACTIVE,
      subscription: live[0] ?? null,
      liveCount,
    }
  }

  if (!pkg.requiresSubscription) {
    return {
      outcome: AccessOutcome.GRANTED,
      subscription: live[0] ?? null,
      liveCount,
    }
  }

  const current = live[0]
  if (!current) {
    const latest = [...params.subscriptions].sort(byCreatedDesc)[0]
    let reason = DenialReason.NO_SUBSCRIPTION
    if (latest?.status === SubscriptionStatus.EXPIRED) {
      reason = DenialReason.EXPIRED
    } else if (latest?.status === SubscriptionStatus.CANCELLED) {
      reason = DenialReason.CANCELLED
    }
    return {
      outcome: AccessOutcome.DENIED,
      reason,
      subscription: latest ?? null,
      liveCount,
    }
  }

  if (current.startAt.getTime() > now.getTime()) {
    return {
      outcome: AccessOutcome.DENIED,
      reason: DenialReason.NOT_STARTED,
      subscription: current,
      liveCount,
    }
  }

  if (current.endAt !== null && now.getTime() >= current.endAt.getTime()) {
    return {
      outcome: AccessOutcome.DENIED,
      reason: DenialReason.EXPIRED,
      subscription: current,
      liveCount,
    }
  }

  return { outcome: AccessOutcome.GRANTED, subscription: current, liveCount }
}

/**
 * Read-only access decisions. Never writes; expiry of a lapsed row is left
 * to the caller.
 */
export class AccessEvaluator {
  private catalogRepository: CatalogRepository
  private subscriptionRepository: SubscriptionRepository

  constructor(deps: AccessEvaluatorDeps) {
    this.catalogRepository = new CatalogRepository(deps)
    this.subscriptionRepository = new SubscriptionRepository(deps)
  }

  /**
   * @throws NotFoundError when the user or the package is unknown
   */
  async evaluate(
    userId: string,
    packageId: string,
    now: Date,
  ): Promise<AccessDecision> {
    const [user, pkg] = await Promise.all([
      this.catalogRepository.getUser(userId),
      this.catalogRepository.getPackage(packageId),
    ])
    if (!user) {
      throw AccessErrors.userNotFound(userId)
    }
    if (!pkg) {
      throw AccessErrors.packageNotFound(packageId)
    }

    const subscriptions = await this.subscriptionRepository.findForPair(
      userId,
      packageId,
    )

    return decideAccess({ pkg, subscriptions, now })
  }
}
