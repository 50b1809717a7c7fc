import {
  createTestDB,
  createTestEnv,
  createTestPackage,
  createTestUser,
  type TestDB,
} from "@tests/db"
import { addDays, createTestClock, FIXED_DATE } from "@tests/test-utils"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import {
  AccessOutcome,
  DenialReason,
  SubscriptionStatus,
} from "@/constants/subscription.constants"
import { NotFoundError } from "@/errors/access.errors"
import { AuditRepository } from "@/repositories/audit.repository"
import type { AppEnv } from "@/types/app.env"
import { AccessService } from "./access.service"
import { AuditService } from "./audit.service"
import { SubscriptionService } from "./subscription.service"

describe("AccessService", () => {
  let testDB: TestDB
  let clock: ReturnType<typeof createTestClock>
  let env: AppEnv
  let service: AccessService
  let subscriptions: SubscriptionService
  let audit: AuditService

  const USER = "user-1"
  const PACKAGE = "pkg-forvaltningsrett"
  const CLIENT = { ipAddress: "198.51.100.4", userAgent: "Mozilla/5.0" }

  beforeEach(() => {
    testDB = createTestDB()
    createTestUser(testDB.db, USER)
    createTestPackage(testDB.db, PACKAGE)
    clock = createTestClock(FIXED_DATE)
    env = createTestEnv(testDB.db, { CLOCK: clock.now })
    service = new AccessService(env)
    subscriptions = new SubscriptionService(env)
    audit = new AuditService(env)
  })

  afterEach(() => {
    vi.restoreAllMocks()
    testDB.dispose()
  })

  it("denies without a subscription and records one denied attempt", async () => {
    const result = await service.checkAccess({
      userId: USER,
      packageId: PACKAGE,
      ...CLIENT,
    })

    expect(result).toEqual({
      granted: false,
      reason: DenialReason.NO_SUBSCRIPTION,
      subscription: null,
      auditId: 1,
    })

    const records = await audit.query({})
    expect(records).toEqual([
      {
        id: 1,
        userId: USER,
        packageId: PACKAGE,
        subscriptionId: null,
        attemptedAt: FIXED_DATE,
        outcome: AccessOutcome.DENIED,
        denialReason: DenialReason.NO_SUBSCRIPTION,
        ipAddress: "198.51.100.4",
        userAgent: "Mozilla/5.0",
      },
    ])
  })

  it("grants during a 30-day purchase and expires it lazily afterwards", async () => {
    const { subscription } = await subscriptions.activate({
      userId: USER,
      packageId: PACKAGE,
      durationInSeconds: 30 * 86_400,
      trial: false,
    })

    const during = await service.checkAccess({
      userId: USER,
      packageId: PACKAGE,
      ...CLIENT,
    })
    expect(during.granted).toBe(true)
    expect(during.subscription?.id).toBe(subscription.id)

    clock.advanceDays(31)
    const after = await service.checkAccess({
      userId: USER,
      packageId: PACKAGE,
      ...CLIENT,
    })
    expect(after).toMatchObject({
      granted: false,
      reason: DenialReason.EXPIRED,
    })

    expect(await subscriptions.findActive(USER, PACKAGE)).toBeNull()
    const history = await subscriptions.listForUser(USER)
    expect(history[0].status).toBe(SubscriptionStatus.EXPIRED)

    const records = await audit.query({ userId: USER })
    expect(
      records.map((r) => [r.outcome, r.denialReason, r.subscriptionId]),
    ).toEqual([
      [AccessOutcome.GRANTED, null, subscription.id],
      [AccessOutcome.DENIED, DenialReason.EXPIRED, subscription.id],
    ])
  })

  it("keeps reporting expired once the row has been transitioned", async () => {
    await subscriptions.activate({
      userId: USER,
      packageId: PACKAGE,
      durationInSeconds: 86_400,
      trial: false,
    })
    clock.advanceDays(2)
    await service.checkAccess({ userId: USER, packageId: PACKAGE, ...CLIENT })

    const again = await service.checkAccess({
      userId: USER,
      packageId: PACKAGE,
      ...CLIENT,
    })

    expect(again).toMatchObject({
      granted: false,
      reason: DenialReason.EXPIRED,
    })
  })

  it("produces exactly one record per check", async () => {
    await subscriptions.startTrial(USER, PACKAGE)

    for (let i = 0; i < 3; i++) {
      await service.checkAccess({ userId: USER, packageId: PACKAGE, ...CLIENT })
    }

    const records = await audit.query({})
    expect(records).toHaveLength(3)
    expect(records.every((r) => r.outcome === AccessOutcome.GRANTED)).toBe(true)
  })

  it("grants packages that require no subscription", async () => {
    createTestPackage(testDB.db, "pkg-free", { requiresSubscription: false })

    const result = await service.checkAccess({
      userId: USER,
      packageId: "pkg-free",
      ...CLIENT,
    })

    expect(result).toEqual({ granted: true, subscription: null, auditId: 1 })
  })

  it("rejects unknown users without auditing", async () => {
    await expect(
      service.checkAccess({ userId: "user-missing", packageId: PACKAGE, ...CLIENT }),
    ).rejects.toBeInstanceOf(NotFoundError)

    expect(await audit.query({})).toEqual([])
  })

  it("returns the decision when the audit write fails", async () => {
    vi.spyOn(AuditRepository.prototype, "insert").mockRejectedValue(
      new Error("database is locked"),
    )
    await subscriptions.startTrial(USER, PACKAGE)

    const result = await service.checkAccess({
      userId: USER,
      packageId: PACKAGE,
      ...CLIENT,
    })

    expect(result.granted).toBe(true)
    expect(result.auditId).toBeNull()
  })

  it("returns the decision when lazy expiry fails", async () => {
    await subscriptions.activate({
      userId: USER,
      packageId: PACKAGE,
      durationInSeconds: 86_400,
      trial: false,
    })
    clock.advanceDays(2)
    const expire = vi
      .spyOn(SubscriptionService.prototype, "expire")
      .mockRejectedValue(new Error("database is locked"))

    const result = await service.checkAccess({
      userId: USER,
      packageId: PACKAGE,
      ...CLIENT,
    })

    expect(expire).toHaveBeenCalledTimes(1)
    expect(result).toMatchObject({
      granted: false,
      reason: DenialReason.EXPIRED,
      auditId: 1,
    })
  })

  it("passes the time of the check to the audit record", async () => {
    clock.set(addDays(FIXED_DATE, 3))

    await service.checkAccess({ userId: USER, packageId: PACKAGE, ...CLIENT })

    const [record] = await audit.query({})
    expect(record.attemptedAt).toEqual(addDays(FIXED_DATE, 3))
  })
})
