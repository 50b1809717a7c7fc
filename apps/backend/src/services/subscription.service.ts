import {
  calculateEndDate,
  canTransition,
  daysToSeconds,
  isLiveStatus,
  SubscriptionStatus,
  type SupersedeStatus,
} from "@/constants/subscription.constants"
import { AccessErrors } from "@/errors/access.errors"
import { LockTimeoutError } from "@/lib/keyed-lock"
import { createLogger } from "@/lib/logger"
import {
  CatalogRepository,
  type CatalogRepositoryDeps,
  type Package,
} from "@/repositories/catalog.repository"
import {
  type ActivateSubscriptionResult,
  type PaymentEventRecord,
  type Subscription,
  SubscriptionRepository,
  type SubscriptionRepositoryDeps,
} from "@/repositories/subscription.repository"
import type { AppEnv } from "@/types/app.env"

// The lock registry, its wait and the clock come from AppEnv so every
// service in the process shares them
export interface SubscriptionServiceDeps
  extends SubscriptionRepositoryDeps,
    CatalogRepositoryDeps,
    Pick<AppEnv, "ACTIVATION_LOCKS" | "ACTIVATION_LOCK_TIMEOUT_MS" | "CLOCK"> {}

export interface ActivateParams {
  userId: string
  packageId: string
  durationInSeconds: number | null // null = unbounded
  trial: boolean
  // Extend from the end of the current live row when it lies in the future
  carryOverRemaining?: boolean
  supersedeAs?: SupersedeStatus
  paymentEvent?: PaymentEventRecord
}

export interface ActivePackage {
  package: Package
  subscription: Subscription
}

const logger = createLogger("subscription.service")

export function activationLockKey(userId: string, packageId: string): string {
  return `${userId}:${packageId}`
}

export class SubscriptionService {
  private subscriptionRepository: SubscriptionRepository
  private catalogRepository: CatalogRepository
  private deps: SubscriptionServiceDeps

  constructor(deps: SubscriptionServiceDeps) {
    this.subscriptionRepository = new SubscriptionRepository(deps)
    this.catalogRepository = new CatalogRepository(deps)
    this.deps = deps
  }

  private async requireUserAndPackage(
    userId: string,
    packageId: string,
  ): Promise<Package> {
    const [user, pkg] = await Promise.all([
      this.catalogRepository.getUser(userId),
      this.catalogRepository.getPackage(packageId),
    ])
    if (!user) throw AccessErrors.userNotFound(userId)
    if (!pkg) throw AccessErrors.packageNotFound(packageId)
    return pkg
  }

  /**
   * Runs fn while holding the pair's activation key. A caller that cannot
   * get the key within ACTIVATION_LOCK_TIMEOUT_MS gets a ConflictError.
   */
  private async withPairLock<T>(
    userId: string,
    packageId: string,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await this.deps.ACTIVATION_LOCKS.runExclusive(
        activationLockKey(userId, packageId),
        this.deps.ACTIVATION_LOCK_TIMEOUT_MS,
        fn,
      )
    } catch (error) {
      if (error instanceof LockTimeoutError) {
        throw AccessErrors.activationInProgress(userId, packageId, error)
      }
      throw error
    }
  }

  /**
   * Makes a new live subscription the only live one for the pair.
   * Any previous live row is superseded (expired unless told otherwise).
   *
   * @throws NotFoundError when the user or package is unknown
   * @throws ConflictError when another activation for the pair holds the key
   *   too long or wins the insert race
   */
  async activate(params: ActivateParams): Promise<ActivateSubscriptionResult> {
    const { userId, packageId } = params
    const log = logger.with({ userId, packageId })

    await this.requireUserAndPackage(userId, packageId)

    const result = await this.withPairLock(userId, packageId, async () => {
      const now = this.deps.CLOCK()

      let windowBase: Date | null = now
      if (params.carryOverRemaining) {
        const [current] = await this.subscriptionRepository.findLive(
          userId,
          packageId,
        )
        if (current && current.endAt === null) {
          // Remaining time of an unbounded row is unbounded
          windowBase = null
        } else if (current?.endAt && current.endAt.getTime() > now.getTime()) {
          windowBase = current.endAt
        }
      }

      const endAt =
        windowBase === null || params.durationInSeconds === null
          ? null
          : calculateEndDate(windowBase, params.durationInSeconds)

      return this.subscriptionRepository.activate({
        userId,
        packageId,
        status: params.trial
          ? SubscriptionStatus.TRIAL
          : SubscriptionStatus.ACTIVE,
        startAt: now,
        endAt,
        isTrial: params.trial,
        supersedeAs: params.supersedeAs ?? SubscriptionStatus.EXPIRED,
        now,
        paymentEvent: params.paymentEvent,
      })
    })

    if (result.created) {
      log.info("Subscription activated", {
        subscriptionId: result.subscription.id,
        status: result.subscription.status,
        endAt: result.subscription.endAt?.toISOString() ?? null,
        superseded: result.supersededIds,
      })
    }

    return result
  }

  /**
   * The live row for the pair, or null
   */
  async findActive(
    userId: string,
    packageId: string,
  ): Promise<Subscription | null> {
    const live = await this.subscriptionRepository.findLive(userId, packageId)
    if (live.length > 1) {
      logger.warn("Multiple live subscriptions for pair", {
        userId,
        packageId,
        subscriptionIds: live.map((s) => s.id),
      })
    }
    return live[0] ?? null
  }

  private async requireSubscription(
    subscriptionId: string,
  ): Promise<Subscription> {
    const subscription =
      await this.subscriptionRepository.getSubscription(subscriptionId)
    if (!subscription) {
      throw AccessErrors.subscriptionNotFound(subscriptionId)
    }
    return subscription
  }

  /**
   * Moves a live row to expired. A row that is no longer live is returned
   * unchanged.
   */
  async expire(subscriptionId: string): Promise<Subscription> {
    const subscription = await this.requireSubscription(subscriptionId)
    if (!isLiveStatus(subscription.status)) {
      return subscription
    }

    const updated = await this.subscriptionRepository.updateStatus({
      subscriptionId,
      from: subscription.status,
      to: SubscriptionStatus.EXPIRED,
      now: this.deps.CLOCK(),
    })
    if (updated) {
      logger.info("Subscription expired", {
        subscriptionId,
        userId: subscription.userId,
        packageId: subscription.packageId,
      })
    }

    return this.requireSubscription(subscriptionId)
  }

  /**
   * Revokes a live row.
   *
   * @throws InvalidTransitionError when the row is already expired or cancelled
   */
  async cancel(subscriptionId: string): Promise<Subscription> {
    const subscription = await this.requireSubscription(subscriptionId)
    if (!canTransition(subscription.status, SubscriptionStatus.CANCELLED)) {
      throw AccessErrors.invalidTransition(
        subscriptionId,
        subscription.status,
        SubscriptionStatus.CANCELLED,
      )
    }

    const updated = await this.subscriptionRepository.updateStatus({
      subscriptionId,
      from: subscription.status,
      to: SubscriptionStatus.CANCELLED,
      now: this.deps.CLOCK(),
    })
    const current = await this.requireSubscription(subscriptionId)
    if (!updated) {
      throw AccessErrors.invalidTransition(
        subscriptionId,
        current.status,
        SubscriptionStatus.CANCELLED,
      )
    }

    logger.info("Subscription cancelled", {
      subscriptionId,
      userId: subscription.userId,
      packageId: subscription.packageId,
    })
    return current
  }

  /**
   * Starts a trial of package.trialPeriodDays days. Only a user who never
   * held the package may start one.
   *
   * @throws TrialUnavailableError when the user already had a subscription for the package
   */
  async startTrial(userId: string, packageId: string): Promise<Subscription> {
    const pkg = await this.requireUserAndPackage(userId, packageId)

    const result = await this.withPairLock(userId, packageId, async () => {
      const history = await this.subscriptionRepository.findForPair(
        userId,
        packageId,
      )
      if (history.length > 0) {
        throw AccessErrors.trialAlreadyUsed(userId, packageId)
      }

      const now = this.deps.CLOCK()
      return this.subscriptionRepository.activate({
        userId,
        packageId,
        status: SubscriptionStatus.TRIAL,
        startAt: now,
        endAt: calculateEndDate(now, daysToSeconds(pkg.trialPeriodDays)),
        isTrial: true,
        supersedeAs: SubscriptionStatus.EXPIRED,
        now,
      })
    })

    logger.info("Trial started", {
      userId,
      packageId,
      subscriptionId: result.subscription.id,
      trialPeriodDays: pkg.trialPeriodDays,
    })
    return result.subscription
  }

  /**
   * Subscription history for a user, newest first
   */
  async listForUser(userId: string): Promise<Subscription[]> {
    const user = await this.catalogRepository.getUser(userId)
    if (!user) throw AccessErrors.userNotFound(userId)

    return this.subscriptionRepository.listForUser(userId)
  }

  /**
   * Active packages the user can open right now: a live row that has
   * started and not passed its end, on a package that is still active
   */
  async listActivePackages(userId: string): Promise<ActivePackage[]> {
    const user = await this.catalogRepository.getUser(userId)
    if (!user) throw AccessErrors.userNotFound(userId)

    const now = this.deps.CLOCK().getTime()
    const live = await this.subscriptionRepository.listLiveForUser(userId)

    const active: ActivePackage[] = []
    for (const subscription of live) {
      if (subscription.startAt.getTime() > now) continue
      if (subscription.endAt && subscription.endAt.getTime() <= now) continue

      const pkg = await this.catalogRepository.getPackage(subscription.packageId)
      if (pkg?.isActive) {
        active.push({ package: pkg, subscription })
      }
    }
    return active
  }
}
