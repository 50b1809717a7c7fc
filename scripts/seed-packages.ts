#!/usr/bin/env tsx

/**
 * Seed Packages Script
 *
 * Syncs the package catalog in apps/backend/database/seed/packages.json
 * into the database at DATABASE_PATH. Existing packages are updated in place.
 *
 * Usage:
 *   npm run seed
 */

import { mkdirSync, readFileSync } from "node:fs"
import path from "node:path"
import {
  DEFAULT_DATABASE_PATH,
  resolveStageConfig,
} from "@/constants/env.constants"
import { systemClock } from "@/lib/clock"
import { migrateDatabase, openDatabase } from "@/lib/database"
import { CatalogService, type SyncPackageParams } from "@/services/catalog.service"

const SEED_FILE = new URL(
  "../apps/backend/database/seed/packages.json",
  import.meta.url,
)

function isSeedPackage(value: unknown): value is SyncPackageParams {
  if (typeof value !== "object" || value === null) return false
  return (
    "id" in value &&
    typeof value.id === "string" &&
    "slug" in value &&
    typeof value.slug === "string" &&
    "name" in value &&
    typeof value.name === "string" &&
    "requiresSubscription" in value &&
    typeof value.requiresSubscription === "boolean" &&
    "isActive" in value &&
    typeof value.isActive === "boolean" &&
    "trialPeriodDays" in value &&
    typeof value.trialPeriodDays === "number"
  )
}

async function main() {
  const seed: unknown = JSON.parse(readFileSync(SEED_FILE, "utf8"))
  if (!Array.isArray(seed) || !seed.every(isSeedPackage)) {
    throw new Error("packages.json must be an array of packages")
  }

  const stage = process.env.STAGE ?? "dev"
  const databasePath = process.env.DATABASE_PATH ?? DEFAULT_DATABASE_PATH

  mkdirSync(path.dirname(databasePath), { recursive: true })
  const sqlite = openDatabase(databasePath)

  try {
    migrateDatabase(sqlite)

    const catalogService = new CatalogService({
      DB: sqlite,
      LOGGING: resolveStageConfig(stage).LOGGING,
      CLOCK: systemClock,
    })

    for (const pkg of seed) {
      await catalogService.syncPackage(pkg)
      console.log(`✅ ${pkg.id}: ${pkg.name}`)
    }
  } finally {
    sqlite.close()
  }
}

main().catch((error: unknown) => {
  console.error("❌ Seeding failed:", error)
  process.exit(1)
})
