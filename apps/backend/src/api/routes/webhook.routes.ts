import { Hono } from "hono"
import {
  PAYMENT_SIGNATURE_HEADER,
  PaymentService,
} from "@/services/payment.service"
import type { AppEnv } from "@/types/app.env"

export const webhookRoutes = new Hono<{ Bindings: AppEnv }>()

/**
 * POST /api/webhook/payments
 * Payment-provider deliveries, authenticated by an HMAC of the raw body
 * (X-Payment-Signature: sha256=<hex>) instead of an API key
 */
webhookRoutes.post("/payments", async (ctx) => {
  const rawBody = await ctx.req.text()
  const signature = ctx.req.header(PAYMENT_SIGNATURE_HEADER)

  const paymentService = new PaymentService(ctx.env)
  const result = await paymentService.handleDelivery(rawBody, signature)

  if (result.status === "ignored") {
    return ctx.json({
      received: true,
      status: result.status,
      event_id: result.eventId,
    })
  }

  return ctx.json({
    received: true,
    status: result.status,
    event_id: result.eventId,
    subscription_id: result.subscription.id,
    duplicate: result.duplicate,
  })
})
