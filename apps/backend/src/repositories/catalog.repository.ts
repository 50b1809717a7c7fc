import * as schema from "@database/schema"
import type Database from "better-sqlite3"
import { eq } from "drizzle-orm"
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3"
import type { LoggingLevel } from "@/constants/env.constants"
import type { UserRole } from "@/constants/subscription.constants"
import { DrizzleLogger } from "@/lib/logger"

export interface User {
  id: string
  email: string
  role: UserRole
  createdAt: string
}

export interface Package {
  id: string
  slug: string
  name: string
  requiresSubscription: boolean
  isActive: boolean
  trialPeriodDays: number
}

export interface CatalogRepositoryDeps {
  DB: Database.Database
  LOGGING: LoggingLevel
}

export interface UpsertUserParams {
  id: string
  email: string
  role: UserRole
}

export interface UpsertPackageParams {
  id: string
  slug: string
  name: string
  requiresSubscription: boolean
  isActive: boolean
  trialPeriodDays: number
  now: Date
}

/**
 * Users and packages as synced in by the hosting platform. The access core
 * only reads them.
 */
export class CatalogRepository {
  private db: BetterSQLite3Database<typeof schema>

  constructor(deps: CatalogRepositoryDeps) {
    this.db = drizzle(deps.DB, {
      schema,
      logger:
        deps.LOGGING === "verbose"
          ? new DrizzleLogger("catalog.repository")
          : undefined,
    })
  }

  private toPackageDomain(row: schema.PackageRow): Package {
    return {
      id: row.id,
      slug: row.slug,
      name: row.name,
      requiresSubscription: row.requiresSubscription,
      isActive: row.isActive,
      trialPeriodDays: row.trialPeriodDays,
    }
  }

  async getUser(userId: string): Promise<User | null> {
    const row = this.db
      .select()
      .from(schema.users)
      .where(eq(schema.users.id, userId))
      .get()

    return row ?? null
  }

  async getPackage(packageId: string): Promise<Package | null> {
    const row = this.db
      .select()
      .from(schema.packages)
      .where(eq(schema.packages.id, packageId))
      .get()

    return row ? this.toPackageDomain(row) : null
  }

  /**
   * Creates the user or updates email and role in place
   */
  async upsertUser(params: UpsertUserParams): Promise<User> {
    this.db
      .insert(schema.users)
      .values(params)
      .onConflictDoUpdate({
        target: schema.users.id,
        set: { email: params.email, role: params.role },
      })
      .run()

    const user = await this.getUser(params.id)
    if (!user) {
      throw new Error(`User ${params.id} missing after upsert`)
    }
    return user
  }

  async upsertPackage(params: UpsertPackageParams): Promise<Package> {
    const { now, ...fields } = params
    const modifiedAt = now.toISOString()

    this.db
      .insert(schema.packages)
      .values({ ...fields, createdAt: modifiedAt, modifiedAt })
      .onConflictDoUpdate({
        target: schema.packages.id,
        set: {
          slug: fields.slug,
          name: fields.name,
          requiresSubscription: fields.requiresSubscription,
          isActive: fields.isActive,
          trialPeriodDays: fields.trialPeriodDays,
          modifiedAt,
        },
      })
      .run()

    const pkg = await this.getPackage(params.id)
    if (!pkg) {
      throw new Error(`Package ${params.id} missing after upsert`)
    }
    return pkg
  }
}
