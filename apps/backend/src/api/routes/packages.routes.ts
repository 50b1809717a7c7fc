import { Hono } from "hono"
import { type AuthContext, apiKeyAuth } from "@/api/middleware/auth.middleware"
import {
  type PackageBodyContext,
  packageBody,
} from "@/api/middleware/catalog.middleware"
import { toPackageResponse } from "@/api/responses"
import { ApiKeyRole } from "@/constants/subscription.constants"
import { CatalogService } from "@/services/catalog.service"
import type { AppEnv } from "@/types/app.env"

export const packageRoutes = new Hono<{
  Bindings: AppEnv
  Variables: { auth: AuthContext; package: PackageBodyContext }
}>()

packageRoutes.use(apiKeyAuth(ApiKeyRole.ADMIN))

/**
 * PUT /api/packages/:packageId
 * Syncs a package from the hosting platform into the catalog
 */
packageRoutes.put("/:packageId", packageBody(), async (ctx) => {
  const { packageId } = ctx.req.param()

  const catalogService = new CatalogService(ctx.env)
  const pkg = await catalogService.syncPackage({
    id: packageId,
    ...ctx.get("package"),
  })

  return ctx.json(toPackageResponse(pkg))
})
