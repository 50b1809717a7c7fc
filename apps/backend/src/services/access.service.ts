import {
  AccessOutcome,
  type DenialReason,
  isLiveStatus,
} from "@/constants/subscription.constants"
import { NotFoundError } from "@/errors/access.errors"
import { createLogger } from "@/lib/logger"
import type { Subscription } from "@/repositories/subscription.repository"
import {
  type AccessDecision,
  AccessEvaluator,
  type AccessEvaluatorDeps,
} from "@/services/access.evaluator"
import { AuditService, type AuditServiceDeps } from "@/services/audit.service"
import {
  SubscriptionService,
  type SubscriptionServiceDeps,
} from "@/services/subscription.service"

export interface AccessServiceDeps
  extends AccessEvaluatorDeps,
    AuditServiceDeps,
    SubscriptionServiceDeps {}

export interface CheckAccessParams {
  userId: string
  packageId: string
  ipAddress: string | null
  userAgent: string
}

export type AccessCheckResult =
  | {
      granted: true
      subscription: Subscription | null
      auditId: number | null // null when the audit write failed
    }
  | {
      granted: false
      reason: DenialReason
      subscription: Subscription | null
      auditId: number | null
    }

const logger = createLogger("access.service")

/**
 * The access check behind every package-gated request: evaluate, audit,
 * then expire a lapsed row.
 */
export class AccessService {
  private evaluator: AccessEvaluator
  private auditService: AuditService
  private subscriptionService: SubscriptionService
  private deps: AccessServiceDeps

  constructor(deps: AccessServiceDeps) {
    this.evaluator = new AccessEvaluator(deps)
    this.auditService = new AuditService(deps)
    this.subscriptionService = new SubscriptionService(deps)
    this.deps = deps
  }

  /**
   * Decides access at the current instant and records exactly one access
   * attempt for it. A failed audit write is logged and the decision stands.
   *
   * @throws NotFoundError when the user or package is unknown (not audited)
   */
  async checkAccess(params: CheckAccessParams): Promise<AccessCheckResult> {
    const { userId, packageId } = params
    const log = logger.with({ userId, packageId })
    const now = this.deps.CLOCK()

    let decision: AccessDecision
    try {
      decision = await this.evaluator.evaluate(userId, packageId, now)
    } catch (error) {
      if (error instanceof NotFoundError) {
        log.warn("Access check for unknown entity", {
          entity: error.entity,
          entityId: error.entityId,
        })
      }
      throw error
    }

    if (decision.liveCount > 1) {
      log.warn("Multiple live subscriptions for pair", {
        liveCount: decision.liveCount,
        chosenSubscriptionId: decision.subscription?.id ?? null,
      })
    }

    const denialReason =
      decision.outcome === AccessOutcome.DENIED ? decision.reason : null

    let auditId: number | null = null
    try {
      const ack = await this.auditService.record({
        userId,
        packageId,
        subscriptionId: decision.subscription?.id ?? null,
        attemptedAt: now,
        outcome: decision.outcome,
        denialReason,
        ipAddress: params.ipAddress,
        userAgent: params.userAgent,
      })
      auditId = ack.id
    } catch (error) {
      log.error("Access attempt not audited", error)
    }

    // Lazy expiry: the evaluator only reports a lapsed live row
    const lapsed = decision.subscription
    if (
      denialReason !== null &&
      lapsed !== null &&
      isLiveStatus(lapsed.status) &&
      lapsed.endAt !== null &&
      now.getTime() >= lapsed.endAt.getTime()
    ) {
      try {
        await this.subscriptionService.expire(lapsed.id)
      } catch (error) {
        log.error("Lazy expiry failed", error)
      }
    }

    if (decision.outcome === AccessOutcome.GRANTED) {
      log.debug("Access granted", { subscriptionId: decision.subscription?.id })
      return { granted: true, subscription: decision.subscription, auditId }
    }

    log.info("Access denied", { reason: decision.reason })
    return {
      granted: false,
      reason: decision.reason,
      subscription: decision.subscription,
      auditId,
    }
  }
}
