import { createMiddleware } from "hono/factory"

/**
 * Where an access check came from, as recorded in the audit trail
 */
export interface ClientContext {
  ipAddress: string | null
  userAgent: string
}

/**
 * First X-Forwarded-For entry, else X-Real-IP, else null
 */
export function resolveClientAddress(
  forwardedFor: string | undefined,
  realIp: string | undefined,
): string | null {
  const forwarded = forwardedFor?.split(",")[0]?.trim()
  if (forwarded) return forwarded

  const real = realIp?.trim()
  return real ? real : null
}

export const clientMetadata = () =>
  createMiddleware<{
    Variables: { client: ClientContext }
  }>(async (ctx, next) => {
    ctx.set("client", {
      ipAddress: resolveClientAddress(
        ctx.req.header("X-Forwarded-For"),
        ctx.req.header("X-Real-IP"),
      ),
      userAgent: ctx.req.header("User-Agent") ?? "",
    })

    await next()
  })
