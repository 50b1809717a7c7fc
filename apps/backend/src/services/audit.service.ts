import { AuditWriteFault } from "@/errors/access.errors"
import { createLogger } from "@/lib/logger"
import {
  type AccessAttempt,
  type AccessAttemptFilter,
  AuditRepository,
  type AuditRepositoryDeps,
  type NewAccessAttempt,
} from "@/repositories/audit.repository"

export type AuditServiceDeps = AuditRepositoryDeps

export interface AuditAck {
  id: number
}

export type AuditQuery = Omit<AccessAttemptFilter, "limit"> & {
  limit?: number
}

export const AUDIT_QUERY_LIMITS = {
  DEFAULT: 100,
  MAX: 1000,
} as const

const logger = createLogger("audit.service")

export class AuditService {
  private auditRepository: AuditRepository

  constructor(deps: AuditServiceDeps) {
    this.auditRepository = new AuditRepository(deps)
  }

  /**
   * Appends one access attempt. The row is committed before the ack is
   * returned.
   *
   * @throws AuditWriteFault when the row could not be written
   */
  async record(attempt: NewAccessAttempt): Promise<AuditAck> {
    try {
      const id = await this.auditRepository.insert(attempt)
      logger.debug("Access attempt recorded", {
        id,
        userId: attempt.userId,
        packageId: attempt.packageId,
        outcome: attempt.outcome,
      })
      return { id }
    } catch (error) {
      throw new AuditWriteFault(error)
    }
  }

  /**
   * Attempts matching the filter, oldest first. The limit is clamped to
   * AUDIT_QUERY_LIMITS.MAX.
   */
  async query(filter: AuditQuery): Promise<AccessAttempt[]> {
    const limit = Math.min(
      filter.limit ?? AUDIT_QUERY_LIMITS.DEFAULT,
      AUDIT_QUERY_LIMITS.MAX,
    )
    return this.auditRepository.query({ ...filter, limit })
  }
}
