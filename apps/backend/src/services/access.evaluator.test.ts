import {
  createTestDB,
  createTestEnv,
  createTestPackage,
  createTestUser,
  type TestDB,
} from "@tests/db"
import { addDays, addSeconds, FIXED_DATE } from "@tests/test-utils"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import {
  AccessOutcome,
  DenialReason,
  SubscriptionStatus,
} from "@/constants/subscription.constants"
import { NotFoundError } from "@/errors/access.errors"
import {
  type Subscription,
  SubscriptionRepository,
} from "@/repositories/subscription.repository"
import { AccessEvaluator, decideAccess } from "./access.evaluator"

function subscription(overrides: Partial<Subscription> = {}): Subscription {
  return {
    id: "sub-1",
    userId: "user-1",
    packageId: "pkg-1",
    status: SubscriptionStatus.ACTIVE,
    startAt: FIXED_DATE,
    endAt: addDays(FIXED_DATE, 30),
    isTrial: false,
    paymentReference: null,
    supersededBy: null,
    createdAt: FIXED_DATE,
    modifiedAt: FIXED_DATE,
    ...overrides,
  }
}

const paidPackage = { requiresSubscription: true, isActive: true }

describe("decideAccess", () => {
  it("denies with no_subscription when the pair has no rows", () => {
    const decision = decideAccess({
      pkg: paidPackage,
      subscriptions: [],
      now: FIXED_DATE,
    })

    expect(decision).toEqual({
      outcome: AccessOutcome.DENIED,
      reason: DenialReason.NO_SUBSCRIPTION,
      subscription: null,
      liveCount: 0,
    })
  })

  it("grants a live subscription inside its window", () => {
    const sub = subscription()

    const decision = decideAccess({
      pkg: paidPackage,
      subscriptions: [sub],
      now: addDays(FIXED_DATE, 10),
    })

    expect(decision.outcome).toBe(AccessOutcome.GRANTED)
    expect(decision.subscription).toBe(sub)
  })

  it("grants until just before the end and denies from the end on", () => {
    const sub = subscription({ endAt: addSeconds(FIXED_DATE, 3600) })
    const at = (seconds: number) =>
      decideAccess({
        pkg: paidPackage,
        subscriptions: [sub],
        now: addSeconds(FIXED_DATE, seconds),
      })

    expect(at(3599).outcome).toBe(AccessOutcome.GRANTED)

    const atEnd = at(3600)
    expect(atEnd.outcome).toBe(AccessOutcome.DENIED)
    expect(atEnd.outcome === AccessOutcome.DENIED && atEnd.reason).toBe(
      DenialReason.EXPIRED,
    )

    expect(at(3601).outcome).toBe(AccessOutcome.DENIED)
  })

  it("never expires an unbounded subscription", () => {
    const decision = decideAccess({
      pkg: paidPackage,
      subscriptions: [subscription({ endAt: null })],
      now: addDays(FIXED_DATE, 10_000),
    })

    expect(decision.outcome).toBe(AccessOutcome.GRANTED)
  })

  it("denies a subscription that has not started", () => {
    const decision = decideAccess({
      pkg: paidPackage,
      subscriptions: [subscription({ startAt: addDays(FIXED_DATE, 1) })],
      now: FIXED_DATE,
    })

    expect(decision).toMatchObject({
      outcome: AccessOutcome.DENIED,
      reason: DenialReason.NOT_STARTED,
    })
  })

  it("reports expired or cancelled from the latest row when nothing is live", () => {
    const older = subscription({
      id: "sub-old",
      status: SubscriptionStatus.EXPIRED,
      createdAt: FIXED_DATE,
    })
    const newer = subscription({
      id: "sub-new",
      status: SubscriptionStatus.CANCELLED,
      createdAt: addDays(FIXED_DATE, 5),
    })

    const decision = decideAccess({
      pkg: paidPackage,
      subscriptions: [older, newer],
      now: addDays(FIXED_DATE, 6),
    })

    expect(decision).toEqual({
      outcome: AccessOutcome.DENIED,
      reason: DenialReason.CANCELLED,
      subscription: newer,
      liveCount: 0,
    })
  })

  it("picks the most recently started live row and reports the anomaly", () => {
    const lapsed = subscription({
      id: "sub-lapsed",
      startAt: FIXED_DATE,
      endAt: addDays(FIXED_DATE, 1),
    })
    const current = subscription({
      id: "sub-current",
      status: SubscriptionStatus.TRIAL,
      startAt: addDays(FIXED_DATE, 2),
      endAt: addDays(FIXED_DATE, 9),
    })

    const decision = decideAccess({
      pkg: paidPackage,
      subscriptions: [lapsed, current],
      now: addDays(FIXED_DATE, 3),
    })

    expect(decision.outcome).toBe(AccessOutcome.GRANTED)
    expect(decision.subscription?.id).toBe("sub-current")
    expect(decision.liveCount).toBe(2)
  })

  it("grants packages that require no subscription", () => {
    const decision = decideAccess({
      pkg: { requiresSubscription: false, isActive: true },
      subscriptions: [],
      now: FIXED_DATE,
    })

    expect(decision.outcome).toBe(AccessOutcome.GRANTED)
    expect(decision.subscription).toBeNull()
  })

  it("denies inactive packages even with a live subscription", () => {
    const decision = decideAccess({
      pkg: { requiresSubscription: true, isActive: false },
      subscriptions: [subscription()],
      now: FIXED_DATE,
    })

    expect(decision).toMatchObject({
      outcome: AccessOutcome.DENIED,
      reason: DenialReason.PACKAGE_INACTIVE,
    })
  })

  it("is deterministic and leaves its input untouched", () => {
    const subs = [
      subscription({ id: "a", startAt: FIXED_DATE }),
      subscription({ id: "b", startAt: addDays(FIXED_DATE, 1) }),
    ]
    const params = {
      pkg: paidPackage,
      subscriptions: subs,
      now: addDays(FIXED_DATE, 2),
    }

    const first = decideAccess(params)
    const second = decideAccess(params)

    expect(second).toEqual(first)
    expect(subs.map((s) => s.id)).toEqual(["a", "b"])
  })
})

describe("AccessEvaluator", () => {
  let testDB: TestDB
  let evaluator: AccessEvaluator
  let repository: SubscriptionRepository

  beforeEach(() => {
    testDB = createTestDB()
    createTestUser(testDB.db, "user-1")
    createTestPackage(testDB.db, "pkg-1")
    const env = createTestEnv(testDB.db)
    evaluator = new AccessEvaluator(env)
    repository = new SubscriptionRepository(env)
  })

  afterEach(() => {
    testDB.dispose()
  })

  it("throws NotFound for an unknown user", async () => {
    await expect(
      evaluator.evaluate("user-missing", "pkg-1", FIXED_DATE),
    ).rejects.toBeInstanceOf(NotFoundError)
  })

  it("throws NotFound for an unknown package", async () => {
    await expect(
      evaluator.evaluate("user-1", "pkg-missing", FIXED_DATE),
    ).rejects.toMatchObject({ entity: "package", entityId: "pkg-missing" })
  })

  it("does not modify a lapsed live row", async () => {
    const { subscription: sub } = await repository.activate({
      userId: "user-1",
      packageId: "pkg-1",
      status: SubscriptionStatus.ACTIVE,
      startAt: FIXED_DATE,
      endAt: addDays(FIXED_DATE, 1),
      isTrial: false,
      supersedeAs: SubscriptionStatus.EXPIRED,
      now: FIXED_DATE,
    })

    const decision = await evaluator.evaluate(
      "user-1",
      "pkg-1",
      addDays(FIXED_DATE, 2),
    )

    expect(decision).toMatchObject({
      outcome: AccessOutcome.DENIED,
      reason: DenialReason.EXPIRED,
    })
    const stored = await repository.getSubscription(sub.id)
    expect(stored?.status).toBe(SubscriptionStatus.ACTIVE)
  })
})
