import { Hono } from "hono"
import { type AuthContext, apiKeyAuth } from "@/api/middleware/auth.middleware"
import { toAccessAttemptResponse } from "@/api/responses"
import {
  AccessOutcome,
  ApiKeyRole,
} from "@/constants/subscription.constants"
import { ErrorCode, HTTPError } from "@/errors/http.errors"
import { AuditService } from "@/services/audit.service"
import type { AppEnv } from "@/types/app.env"

export const auditRoutes = new Hono<{
  Bindings: AppEnv
  Variables: { auth: AuthContext }
}>()

auditRoutes.use(apiKeyAuth(ApiKeyRole.ADMIN))

function isAccessOutcome(value: string): value is AccessOutcome {
  return Object.values<string>(AccessOutcome).includes(value)
}

function parseTimestamp(name: string, value: string | undefined) {
  if (value === undefined) return undefined
  const date = new Date(value)
  if (Number.isNaN(date.getTime())) {
    throw new HTTPError(
      400,
      ErrorCode.INVALID_FORMAT,
      `${name} must be an ISO-8601 timestamp`,
    )
  }
  return date
}

/**
 * GET /api/audit/access-attempts
 * Query: user_id, package_id, outcome, from, to, limit
 * Returns matching attempts, oldest first
 */
auditRoutes.get("/access-attempts", async (ctx) => {
  const outcome = ctx.req.query("outcome")
  if (outcome !== undefined && !isAccessOutcome(outcome)) {
    throw new HTTPError(
      400,
      ErrorCode.INVALID_FORMAT,
      `Invalid outcome. Supported outcomes: ${Object.values(AccessOutcome).join(", ")}`,
    )
  }

  const rawLimit = ctx.req.query("limit")
  let limit: number | undefined
  if (rawLimit !== undefined) {
    limit = Number(rawLimit)
    if (!Number.isInteger(limit) || limit < 1) {
      throw new HTTPError(
        400,
        ErrorCode.INVALID_FORMAT,
        "limit must be a positive integer",
      )
    }
  }

  const auditService = new AuditService(ctx.env)
  const attempts = await auditService.query({
    userId: ctx.req.query("user_id"),
    packageId: ctx.req.query("package_id"),
    outcome,
    from: parseTimestamp("from", ctx.req.query("from")),
    to: parseTimestamp("to", ctx.req.query("to")),
    limit,
  })

  return ctx.json({ attempts: attempts.map(toAccessAttemptResponse) })
})
