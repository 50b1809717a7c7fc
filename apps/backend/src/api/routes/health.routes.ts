import { Hono } from "hono"

import type { AppEnv } from "@/types/app.env"

export const healthRoutes = new Hono<{ Bindings: AppEnv }>()

healthRoutes.get("/", (ctx) => {
  return ctx.json({
    status: "healthy",
    timestamp: ctx.env.CLOCK().toISOString(),
  })
})
