import { Hono } from "hono"
import { type AuthContext, apiKeyAuth } from "@/api/middleware/auth.middleware"
import { toSubscriptionResponse } from "@/api/responses"
import { ApiKeyRole } from "@/constants/subscription.constants"
import { SubscriptionService } from "@/services/subscription.service"
import type { AppEnv } from "@/types/app.env"

export const subscriptionRoutes = new Hono<{
  Bindings: AppEnv
  Variables: { auth: AuthContext }
}>()

// Revocation is an administrator action
subscriptionRoutes.use(apiKeyAuth(ApiKeyRole.ADMIN))

/**
 * POST /api/subscriptions/:subscriptionId/cancel
 * Revokes a live subscription
 */
subscriptionRoutes.post("/:subscriptionId/cancel", async (ctx) => {
  const { subscriptionId } = ctx.req.param()
  const { label } = ctx.get("auth")

  const subscriptionService = new SubscriptionService(ctx.env)
  const subscription = await subscriptionService.cancel(subscriptionId)

  return ctx.json({
    subscription: toSubscriptionResponse(subscription),
    cancelled_by: label,
  })
})
