import { createHmac, timingSafeEqual } from "node:crypto"
import {
  daysToSeconds,
  SUBSCRIPTION_DEFAULTS,
  SUBSCRIPTION_LIMITS,
} from "@/constants/subscription.constants"
import { ErrorCode, HTTPError } from "@/errors/http.errors"
import { createLogger } from "@/lib/logger"
import { withConflictRetry } from "@/lib/retry.logic"
import type { Subscription } from "@/repositories/subscription.repository"
import {
  SubscriptionService,
  type SubscriptionServiceDeps,
} from "@/services/subscription.service"
import type { AppEnv } from "@/types/app.env"

export interface PaymentServiceDeps
  extends SubscriptionServiceDeps,
    Pick<AppEnv, "PAYMENT_WEBHOOK_SECRET"> {}

export const PAYMENT_SIGNATURE_HEADER = "X-Payment-Signature"
export const PAYMENT_SUCCEEDED = "payment.succeeded"

export interface PaymentConfirmation {
  eventId: string
  userId: string
  packageId: string
  durationDays?: number | null // defaults to a one-year purchase
}

export interface PaymentResult {
  subscription: Subscription
  duplicate: boolean
}

export type PaymentDeliveryResult =
  | ({ status: "processed"; eventId: string } & PaymentResult)
  | { status: "ignored"; eventId: string; type: string }

const logger = createLogger("payment.service")

/**
 * HMAC-SHA256 of the raw body, as sent in X-Payment-Signature
 */
export function signPaymentPayload(secret: string, payload: string): string {
  const hex = createHmac("sha256", secret).update(payload).digest("hex")
  return `sha256=${hex}`
}

export function verifyPaymentSignature(
  secret: string,
  payload: string,
  signature: string | undefined,
): boolean {
  if (!signature) return false

  const expected = Buffer.from(signPaymentPayload(secret, payload))
  const received = Buffer.from(signature)
  if (expected.length !== received.length) return false

  return timingSafeEqual(expected, received)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new HTTPError(400, ErrorCode.MISSING_FIELD, `${field} is required`)
  }
  return value
}

/**
 * Order/payment bridge: turns confirmed payments into subscriptions,
 * at most once per external event id.
 */
export class PaymentService {
  private subscriptionService: SubscriptionService
  private deps: PaymentServiceDeps

  constructor(deps: PaymentServiceDeps) {
    this.subscriptionService = new SubscriptionService(deps)
    this.deps = deps
  }

  /**
   * Activates (or renews) the pair for a confirmed payment. Remaining time
   * on a current subscription carries over. A repeated event id returns the
   * subscription from the first delivery.
   */
  async onPaymentConfirmed(
    confirmation: PaymentConfirmation,
  ): Promise<PaymentResult> {
    const { eventId, userId, packageId } = confirmation
    const durationDays =
      confirmation.durationDays ?? SUBSCRIPTION_DEFAULTS.PURCHASE_DURATION_DAYS
    const log = logger.with({ eventId, userId, packageId })

    const { subscription, created } = await withConflictRetry(() =>
      this.subscriptionService.activate({
        userId,
        packageId,
        durationInSeconds: daysToSeconds(durationDays),
        trial: false,
        carryOverRemaining: true,
        paymentEvent: { eventId, durationDays },
      }),
    )

    if (created) {
      log.info("Payment activated subscription", {
        subscriptionId: subscription.id,
        durationDays,
      })
    } else {
      log.info("Duplicate payment event ignored", {
        subscriptionId: subscription.id,
      })
    }

    return { subscription, duplicate: !created }
  }

  /**
   * Verifies, parses and applies one webhook delivery
   *
   * @throws HTTPError 401 on a bad signature, 400 on a malformed event
   */
  async handleDelivery(
    rawBody: string,
    signature: string | undefined,
  ): Promise<PaymentDeliveryResult> {
    if (
      !verifyPaymentSignature(this.deps.PAYMENT_WEBHOOK_SECRET, rawBody, signature)
    ) {
      logger.warn("Payment webhook signature rejected")
      throw new HTTPError(
        401,
        ErrorCode.INVALID_SIGNATURE,
        "Invalid payment signature",
      )
    }

    let body: unknown
    try {
      body = JSON.parse(rawBody)
    } catch {
      throw new HTTPError(
        400,
        ErrorCode.INVALID_REQUEST,
        "Payment event body is not valid JSON",
      )
    }
    if (!isRecord(body)) {
      throw new HTTPError(
        400,
        ErrorCode.INVALID_REQUEST,
        "Payment event must be a JSON object",
      )
    }

    const eventId = requireString(body.id, "id")
    const type = requireString(body.type, "type")

    if (type !== PAYMENT_SUCCEEDED) {
      logger.info("Payment event type ignored", { eventId, type })
      return { status: "ignored", eventId, type }
    }

    const { data } = body
    if (!isRecord(data)) {
      throw new HTTPError(400, ErrorCode.MISSING_FIELD, "data is required")
    }

    const durationDays = data.duration_days
    if (
      durationDays !== undefined &&
      durationDays !== null &&
      !(
        typeof durationDays === "number" &&
        Number.isInteger(durationDays) &&
        durationDays > 0 &&
        durationDays <= SUBSCRIPTION_LIMITS.MAX_PURCHASE_DURATION_DAYS
      )
    ) {
      throw new HTTPError(
        400,
        ErrorCode.INVALID_FORMAT,
        `data.duration_days must be an integer from 1 to ${SUBSCRIPTION_LIMITS.MAX_PURCHASE_DURATION_DAYS}`,
      )
    }

    const result = await this.onPaymentConfirmed({
      eventId,
      userId: requireString(data.user_id, "data.user_id"),
      packageId: requireString(data.package_id, "data.package_id"),
      durationDays: typeof durationDays === "number" ? durationDays : null,
    })

    return { status: "processed", eventId, ...result }
  }
}
