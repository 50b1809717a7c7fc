import { Hono } from "hono"
import { type AuthContext, apiKeyAuth } from "@/api/middleware/auth.middleware"
import {
  type UserBodyContext,
  userBody,
} from "@/api/middleware/catalog.middleware"
import {
  type ClientContext,
  clientMetadata,
} from "@/api/middleware/client.middleware"
import {
  toPackageResponse,
  toSubscriptionResponse,
} from "@/api/responses"
import { ApiKeyRole } from "@/constants/subscription.constants"
import { AccessService } from "@/services/access.service"
import { CatalogService } from "@/services/catalog.service"
import { SubscriptionService } from "@/services/subscription.service"
import type { AppEnv } from "@/types/app.env"

export const userRoutes = new Hono<{
  Bindings: AppEnv
  Variables: { auth: AuthContext; client: ClientContext; user: UserBodyContext }
}>()

/**
 * GET /api/users/:userId/packages/:packageId/access
 * Decides access for the user and package at this instant and records the
 * attempt. 200 when granted, 403 with the denial reason otherwise.
 */
userRoutes.get(
  "/:userId/packages/:packageId/access",
  apiKeyAuth(ApiKeyRole.SERVICE),
  clientMetadata(),
  async (ctx) => {
    const { userId, packageId } = ctx.req.param()
    const client = ctx.get("client")

    const accessService = new AccessService(ctx.env)
    const result = await accessService.checkAccess({
      userId,
      packageId,
      ipAddress: client.ipAddress,
      userAgent: client.userAgent,
    })

    if (!result.granted) {
      return ctx.json(
        {
          granted: false,
          reason: result.reason,
          user_id: userId,
          package_id: packageId,
        },
        403,
      )
    }

    return ctx.json({
      granted: true,
      user_id: userId,
      package_id: packageId,
      subscription: result.subscription
        ? toSubscriptionResponse(result.subscription)
        : null,
    })
  },
)

/**
 * GET /api/users/:userId/packages
 * Packages the user can open right now
 */
userRoutes.get(
  "/:userId/packages",
  apiKeyAuth(ApiKeyRole.SERVICE),
  async (ctx) => {
    const { userId } = ctx.req.param()

    const subscriptionService = new SubscriptionService(ctx.env)
    const active = await subscriptionService.listActivePackages(userId)

    return ctx.json({
      packages: active.map(({ package: pkg, subscription }) => ({
        ...toPackageResponse(pkg),
        subscription: toSubscriptionResponse(subscription),
      })),
    })
  },
)

/**
 * GET /api/users/:userId/subscriptions
 * Subscription history, newest first
 */
userRoutes.get(
  "/:userId/subscriptions",
  apiKeyAuth(ApiKeyRole.SERVICE),
  async (ctx) => {
    const { userId } = ctx.req.param()

    const subscriptionService = new SubscriptionService(ctx.env)
    const subscriptions = await subscriptionService.listForUser(userId)

    return ctx.json({
      subscriptions: subscriptions.map(toSubscriptionResponse),
    })
  },
)

/**
 * POST /api/users/:userId/packages/:packageId/trial
 * Starts the package's trial for a user who never held it
 */
userRoutes.post(
  "/:userId/packages/:packageId/trial",
  apiKeyAuth(ApiKeyRole.SERVICE),
  async (ctx) => {
    const { userId, packageId } = ctx.req.param()

    const subscriptionService = new SubscriptionService(ctx.env)
    const trial = await subscriptionService.startTrial(userId, packageId)

    return ctx.json({ subscription: toSubscriptionResponse(trial) }, 201)
  },
)

/**
 * PUT /api/users/:userId
 * Syncs a user from the hosting platform into the catalog
 */
userRoutes.put(
  "/:userId",
  apiKeyAuth(ApiKeyRole.ADMIN),
  userBody(),
  async (ctx) => {
    const { userId } = ctx.req.param()
    const { email, role } = ctx.get("user")

    const catalogService = new CatalogService(ctx.env)
    const user = await catalogService.syncUser({ id: userId, email, role })

    return ctx.json({
      id: user.id,
      email: user.email,
      role: user.role,
      created_at: user.createdAt,
    })
  },
)
