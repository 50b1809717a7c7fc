import type { UserRole } from "@/constants/subscription.constants"
import { isUniqueViolation } from "@/errors/access.errors"
import { ErrorCode, HTTPError } from "@/errors/http.errors"
import { createLogger } from "@/lib/logger"
import {
  CatalogRepository,
  type CatalogRepositoryDeps,
  type Package,
  type User,
} from "@/repositories/catalog.repository"
import type { AppEnv } from "@/types/app.env"

export interface CatalogServiceDeps
  extends CatalogRepositoryDeps,
    Pick<AppEnv, "CLOCK"> {}

export interface SyncUserParams {
  id: string
  email: string
  role: UserRole
}

export interface SyncPackageParams {
  id: string
  slug: string
  name: string
  requiresSubscription: boolean
  isActive: boolean
  trialPeriodDays: number
}

const logger = createLogger("catalog.service")

/**
 * Keeps the users and packages the access core refers to in step with the
 * hosting platform
 */
export class CatalogService {
  private catalogRepository: CatalogRepository
  private deps: CatalogServiceDeps

  constructor(deps: CatalogServiceDeps) {
    this.catalogRepository = new CatalogRepository(deps)
    this.deps = deps
  }

  async syncUser(params: SyncUserParams): Promise<User> {
    try {
      const user = await this.catalogRepository.upsertUser(params)
      logger.info("User synced", { userId: user.id, role: user.role })
      return user
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new HTTPError(
          409,
          ErrorCode.CONFLICT,
          "Email already belongs to another user",
          { userId: params.id },
        )
      }
      throw error
    }
  }

  async syncPackage(params: SyncPackageParams): Promise<Package> {
    try {
      const pkg = await this.catalogRepository.upsertPackage({
        ...params,
        now: this.deps.CLOCK(),
      })
      logger.info("Package synced", {
        packageId: pkg.id,
        isActive: pkg.isActive,
      })
      return pkg
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new HTTPError(
          409,
          ErrorCode.CONFLICT,
          "Slug already belongs to another package",
          { packageId: params.id },
        )
      }
      throw error
    }
  }
}
