import * as schema from "@database/schema"
import type Database from "better-sqlite3"
import { eq } from "drizzle-orm"
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3"
import type { LoggingLevel } from "@/constants/env.constants"
import type { ApiKeyRole } from "@/constants/subscription.constants"
import { DrizzleLogger } from "@/lib/logger"

export interface ApiKey {
  keyHash: string
  label: string
  role: ApiKeyRole
}

export interface ApiKeyRepositoryDeps {
  DB: Database.Database
  LOGGING: LoggingLevel
}

export interface CreateApiKeyParams {
  keyHash: string
  label: string
  role: ApiKeyRole
}

export class ApiKeyRepository {
  private db: BetterSQLite3Database<typeof schema>

  constructor(deps: ApiKeyRepositoryDeps) {
    this.db = drizzle(deps.DB, {
      schema,
      logger:
        deps.LOGGING === "verbose"
          ? new DrizzleLogger("api-key.repository")
          : undefined,
    })
  }

  async createApiKey(params: CreateApiKeyParams): Promise<void> {
    this.db.insert(schema.apiKeys).values(params).run()
  }

  /**
   * Gets the key record by the hash of its secret part
   */
  async getApiKeyByHash(keyHash: string): Promise<ApiKey | null> {
    const row = this.db
      .select({
        keyHash: schema.apiKeys.keyHash,
        label: schema.apiKeys.label,
        role: schema.apiKeys.role,
      })
      .from(schema.apiKeys)
      .where(eq(schema.apiKeys.keyHash, keyHash))
      .get()

    return row ?? null
  }
}
