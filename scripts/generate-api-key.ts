#!/usr/bin/env tsx

/**
 * Generate API Key Script
 *
 * Creates an API key for a caller of the access API and stores its hash in
 * the database at DATABASE_PATH. The key itself is printed once.
 *
 * Usage:
 *   npm run api-key -- <label> [service|admin]
 *
 * Example:
 *   npm run api-key -- portal-frontend service
 */

import { mkdirSync } from "node:fs"
import path from "node:path"
import { parseArgs } from "node:util"
import {
  DEFAULT_DATABASE_PATH,
  resolveStageConfig,
} from "@/constants/env.constants"
import { ApiKeyRole } from "@/constants/subscription.constants"
import { migrateDatabase, openDatabase } from "@/lib/database"
import { ApiKeyService } from "@/services/api-key.service"

function isApiKeyRole(value: string): value is ApiKeyRole {
  return Object.values<string>(ApiKeyRole).includes(value)
}

async function main() {
  const { positionals } = parseArgs({ allowPositionals: true })
  const [label, role = ApiKeyRole.SERVICE] = positionals

  if (!label || !isApiKeyRole(role)) {
    console.error("Usage: npm run api-key -- <label> [service|admin]")
    process.exit(1)
  }

  const stage = process.env.STAGE ?? "dev"
  const databasePath = process.env.DATABASE_PATH ?? DEFAULT_DATABASE_PATH

  mkdirSync(path.dirname(databasePath), { recursive: true })
  const sqlite = openDatabase(databasePath)

  try {
    migrateDatabase(sqlite)

    const apiKeyService = new ApiKeyService({
      DB: sqlite,
      STAGE: stage,
      LOGGING: resolveStageConfig(stage).LOGGING,
    })
    const { apiKey, keyHash } = await apiKeyService.createApiKey({
      label,
      role,
    })

    console.log("✅ Generated API Key:\n")
    console.log(`API_KEY:  ${apiKey}`)
    console.log(`KEY_HASH: ${keyHash}`)
    console.log(`ROLE:     ${role}\n`)
    console.log("📋 Only the hash is stored. Copy the key now, it is not shown again.")
  } finally {
    sqlite.close()
  }
}

main().catch((error: unknown) => {
  console.error("❌ Failed to generate API key:", error)
  process.exit(1)
})
