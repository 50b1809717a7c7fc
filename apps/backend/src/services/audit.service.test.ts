import { createTestDB, createTestEnv, type TestDB } from "@tests/db"
import { addDays, FIXED_DATE } from "@tests/test-utils"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import {
  AccessOutcome,
  DenialReason,
} from "@/constants/subscription.constants"
import { AuditWriteFault } from "@/errors/access.errors"
import {
  AuditRepository,
  type NewAccessAttempt,
} from "@/repositories/audit.repository"
import { AuditService } from "./audit.service"

function attempt(overrides: Partial<NewAccessAttempt> = {}): NewAccessAttempt {
  return {
    userId: "user-1",
    packageId: "pkg-1",
    subscriptionId: null,
    attemptedAt: FIXED_DATE,
    outcome: AccessOutcome.DENIED,
    denialReason: DenialReason.NO_SUBSCRIPTION,
    ipAddress: "203.0.113.7",
    userAgent: "vitest",
    ...overrides,
  }
}

describe("AuditService", () => {
  let testDB: TestDB
  let service: AuditService

  beforeEach(() => {
    testDB = createTestDB()
    service = new AuditService(createTestEnv(testDB.db))
  })

  afterEach(() => {
    vi.restoreAllMocks()
    testDB.dispose()
  })

  describe("record", () => {
    it("persists the attempt before acknowledging", async () => {
      const ack = await service.record(attempt())

      expect(ack).toEqual({ id: 1 })
      const [stored] = await service.query({ userId: "user-1" })
      expect(stored).toEqual({ id: 1, ...attempt() })
    })

    it("wraps write failures in AuditWriteFault", async () => {
      vi.spyOn(AuditRepository.prototype, "insert").mockRejectedValue(
        new Error("disk I/O error"),
      )

      const result = service.record(attempt())

      await expect(result).rejects.toBeInstanceOf(AuditWriteFault)
      await expect(result).rejects.toThrow(
        "Audit record could not be written: disk I/O error",
      )
    })

    it("keeps records append-only", async () => {
      await service.record(attempt())

      expect(() =>
        testDB.db.prepare("UPDATE access_attempts SET outcome = 'granted'").run(),
      ).toThrow("access_attempts is append-only")
      expect(() =>
        testDB.db.prepare("DELETE FROM access_attempts").run(),
      ).toThrow("access_attempts is append-only")
    })
  })

  describe("query", () => {
    beforeEach(async () => {
      await service.record(attempt({ attemptedAt: addDays(FIXED_DATE, 2) }))
      await service.record(
        attempt({
          attemptedAt: FIXED_DATE,
          outcome: AccessOutcome.GRANTED,
          denialReason: null,
          subscriptionId: "sub-1",
        }),
      )
      await service.record(
        attempt({ userId: "user-2", attemptedAt: addDays(FIXED_DATE, 1) }),
      )
      await service.record(attempt({ attemptedAt: addDays(FIXED_DATE, 2) }))
    })

    it("orders by time, then by insertion", async () => {
      const records = await service.query({})

      expect(records.map((r) => r.id)).toEqual([2, 3, 1, 4])
    })

    it("filters by user and outcome", async () => {
      const denied = await service.query({
        userId: "user-1",
        outcome: AccessOutcome.DENIED,
      })

      expect(denied.map((r) => r.id)).toEqual([1, 4])
    })

    it("filters by time range, inclusive", async () => {
      const records = await service.query({
        from: addDays(FIXED_DATE, 1),
        to: addDays(FIXED_DATE, 1),
      })

      expect(records.map((r) => r.userId)).toEqual(["user-2"])
    })

    it("applies the limit", async () => {
      const records = await service.query({ limit: 2 })

      expect(records.map((r) => r.id)).toEqual([2, 3])
    })
  })
})
