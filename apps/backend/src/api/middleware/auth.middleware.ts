import type { MiddlewareHandler } from "hono"
import { ApiKeyRole } from "@/constants/subscription.constants"
import { ErrorCode, HTTPError } from "@/errors/http.errors"
import { ApiKeyService } from "@/services/api-key.service"
import type { AppEnv } from "@/types/app.env"

/**
 * Context with the authenticated caller
 */
export interface AuthContext {
  label: string
  role: ApiKeyRole
}

function hasRole(actual: ApiKeyRole, required: ApiKeyRole): boolean {
  // Admin keys may do everything service keys may do
  return actual === ApiKeyRole.ADMIN || actual === required
}

/**
 * API Key authentication middleware
 * Validates Authorization: Bearer header, checks the key's role and adds the
 * caller to context
 */
export const apiKeyAuth = (
  requiredRole: ApiKeyRole = ApiKeyRole.SERVICE,
): MiddlewareHandler<{
  Bindings: AppEnv
  Variables: { auth: AuthContext }
}> => {
  return async function apiKeyAuthHandler(c, next) {
    const authHeader = c.req.header("Authorization")
    const apiKey = authHeader?.replace("Bearer ", "")

    if (!apiKey) {
      throw new HTTPError(401, ErrorCode.UNAUTHORIZED, "Missing API key")
    }

    const apiKeyService = new ApiKeyService(c.env)
    const key = await apiKeyService.authenticateApiKey(apiKey)

    if (!hasRole(key.role, requiredRole)) {
      throw new HTTPError(
        403,
        ErrorCode.FORBIDDEN,
        `This operation requires the ${requiredRole} role`,
      )
    }

    c.set("auth", { label: key.label, role: key.role })
    await next()
  }
}
