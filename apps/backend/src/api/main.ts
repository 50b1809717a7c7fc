import { Hono } from "hono"
import { cors } from "hono/cors"
import { HTTPException } from "hono/http-exception"
import { auditRoutes } from "@/api/routes/audit.routes"
import { healthRoutes } from "@/api/routes/health.routes"
import { packageRoutes } from "@/api/routes/packages.routes"
import { subscriptionRoutes } from "@/api/routes/subscriptions.routes"
import { userRoutes } from "@/api/routes/users.routes"
import { webhookRoutes } from "@/api/routes/webhook.routes"
import { AccessError, toHTTPError } from "@/errors/access.errors"
import { ErrorCode } from "@/errors/http.errors"
import { logger } from "@/lib/logger"
import type { AppEnv } from "@/types/app.env"

const app = new Hono<{ Bindings: AppEnv }>().basePath("/api")

// CORS middleware
app.use(cors())

// Error handler middleware
app.onError((error, ctx) => {
  logger
    .with({ path: ctx.req.path, method: ctx.req.method })
    .error("Request error", error)

  // Domain failures from services map onto HTTP errors
  if (error instanceof AccessError) {
    return toHTTPError(error).getResponse()
  }

  // Return HTTPException response (HTTPError extends HTTPException)
  if (error instanceof HTTPException) {
    return error.getResponse()
  }

  // Handle unexpected errors
  return ctx.json(
    {
      error: "Internal server error",
      code: ErrorCode.INTERNAL_ERROR,
    },
    500,
  )
})

// Mount routes
app.route("/health", healthRoutes)
app.route("/users", userRoutes)
app.route("/packages", packageRoutes)
app.route("/subscriptions", subscriptionRoutes)
app.route("/audit", auditRoutes)
app.route("/webhook", webhookRoutes)

export default app
