import type { Context } from "hono"
import { createMiddleware } from "hono/factory"
import {
  SUBSCRIPTION_DEFAULTS,
  SUBSCRIPTION_LIMITS,
  UserRole,
} from "@/constants/subscription.constants"
import { ErrorCode, HTTPError } from "@/errors/http.errors"

export interface UserBodyContext {
  email: string
  role: UserRole
}

export interface PackageBodyContext {
  slug: string
  name: string
  requiresSubscription: boolean
  isActive: boolean
  trialPeriodDays: number
}

const SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/

function isUserRole(value: unknown): value is UserRole {
  return Object.values<unknown>(UserRole).includes(value)
}

async function readJsonObject(
  ctx: Context,
): Promise<Record<string, unknown>> {
  let body: unknown
  try {
    body = await ctx.req.json()
  } catch {
    throw new HTTPError(
      400,
      ErrorCode.INVALID_REQUEST,
      "Request body must be valid JSON",
    )
  }
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new HTTPError(
      400,
      ErrorCode.INVALID_REQUEST,
      "Request body must be a JSON object",
    )
  }
  return { ...body }
}

function optionalBoolean(
  body: Record<string, unknown>,
  field: string,
  fallback: boolean,
): boolean {
  const value = body[field]
  if (value === undefined) return fallback
  if (typeof value !== "boolean") {
    throw new HTTPError(
      400,
      ErrorCode.INVALID_FORMAT,
      `${field} must be a boolean`,
    )
  }
  return value
}

export const userBody = () =>
  createMiddleware<{
    Variables: { user: UserBodyContext }
  }>(async (ctx, next) => {
    const body = await readJsonObject(ctx)
    const { email, role } = body

    if (typeof email !== "string" || !email) {
      throw new HTTPError(400, ErrorCode.MISSING_FIELD, "email is required")
    }

    if (!email.includes("@")) {
      throw new HTTPError(400, ErrorCode.INVALID_FORMAT, "Invalid email format")
    }

    if (role !== undefined && !isUserRole(role)) {
      throw new HTTPError(
        400,
        ErrorCode.INVALID_FORMAT,
        `Invalid role. Supported roles: ${Object.values(UserRole).join(", ")}`,
      )
    }

    ctx.set("user", { email, role: role ?? UserRole.CLIENT })

    await next()
  })

export const packageBody = () =>
  createMiddleware<{
    Variables: { package: PackageBodyContext }
  }>(async (ctx, next) => {
    const body = await readJsonObject(ctx)
    const { slug, name } = body

    if (typeof slug !== "string" || !slug) {
      throw new HTTPError(400, ErrorCode.MISSING_FIELD, "slug is required")
    }

    if (!SLUG_PATTERN.test(slug)) {
      throw new HTTPError(
        400,
        ErrorCode.INVALID_FORMAT,
        "slug must be lowercase letters, digits and single dashes",
      )
    }

    if (typeof name !== "string" || !name) {
      throw new HTTPError(400, ErrorCode.MISSING_FIELD, "name is required")
    }

    const trialPeriodDays =
      body.trial_period_days ?? SUBSCRIPTION_DEFAULTS.TRIAL_PERIOD_DAYS
    if (
      typeof trialPeriodDays !== "number" ||
      !Number.isInteger(trialPeriodDays) ||
      trialPeriodDays < 0 ||
      trialPeriodDays > SUBSCRIPTION_LIMITS.MAX_TRIAL_PERIOD_DAYS
    ) {
      throw new HTTPError(
        400,
        ErrorCode.INVALID_FORMAT,
        `trial_period_days must be an integer from 0 to ${SUBSCRIPTION_LIMITS.MAX_TRIAL_PERIOD_DAYS}`,
      )
    }

    ctx.set("package", {
      slug,
      name,
      requiresSubscription: optionalBoolean(body, "requires_subscription", true),
      isActive: optionalBoolean(body, "is_active", true),
      trialPeriodDays,
    })

    await next()
  })
