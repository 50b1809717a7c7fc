export enum Stage {
  DEV = "dev",
  STAGING = "staging",
  PROD = "prod",
}

export type LoggingLevel = "verbose" | "minimal"

export interface StageConfig {
  LOGGING: LoggingLevel
  ACTIVATION_LOCK_TIMEOUT_MS: number
}

/**
 * Process configuration read from environment variables at startup
 */
export interface AppConfig extends StageConfig {
  STAGE: string
  PORT: number
  DATABASE_PATH: string
  PAYMENT_WEBHOOK_SECRET: string
}

export const DEFAULT_PORT = 3000
export const DEFAULT_DATABASE_PATH = "./data/juridiskporten.db"

/**
 * Resolves stage-specific defaults from the deployment stage
 *
 * @param stage - The deployment stage (dev, staging, prod, or pr-*)
 * @returns Stage configuration with all runtime settings
 */
export function resolveStageConfig(stage: string): StageConfig {
  const isPreview = stage.startsWith("pr-")

  const knownStages: string[] = Object.values(Stage)
  if (!knownStages.includes(stage) && !isPreview) {
    throw new Error(
      `Unknown stage: ${stage}. Expected one of: ${knownStages.join(", ")} or pr-*`,
    )
  }

  // Logging: Minimal for prod, verbose for others
  const LOGGING: LoggingLevel = stage === Stage.PROD ? "minimal" : "verbose"

  // Activation lock: fail fast in dev/preview so contention shows up early
  const ACTIVATION_LOCK_TIMEOUT_MS = stage === Stage.DEV || isPreview ? 1000 : 5000

  return {
    LOGGING,
    ACTIVATION_LOCK_TIMEOUT_MS,
  }
}

function parseLoggingLevel(value: string): LoggingLevel {
  if (value === "verbose" || value === "minimal") return value
  throw new Error(`Invalid LOGGING: ${value}. Expected verbose or minimal`)
}

function parseNonNegativeInteger(name: string, value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid ${name}: ${value}. Expected a non-negative integer`)
  }
  return parsed
}

/**
 * Builds the process configuration. Throws on the first invalid value so
 * a misconfigured process never starts serving.
 */
export function loadConfig(
  env: Record<string, string | undefined>,
): AppConfig {
  const STAGE = env.STAGE ?? Stage.DEV
  const stageConfig = resolveStageConfig(STAGE)

  const PAYMENT_WEBHOOK_SECRET = env.PAYMENT_WEBHOOK_SECRET
  if (!PAYMENT_WEBHOOK_SECRET) {
    throw new Error("PAYMENT_WEBHOOK_SECRET is required")
  }

  const PORT =
    env.PORT !== undefined ? parseNonNegativeInteger("PORT", env.PORT) : DEFAULT_PORT

  return {
    STAGE,
    PORT,
    DATABASE_PATH: env.DATABASE_PATH ?? DEFAULT_DATABASE_PATH,
    PAYMENT_WEBHOOK_SECRET,
    LOGGING:
      env.LOGGING !== undefined
        ? parseLoggingLevel(env.LOGGING)
        : stageConfig.LOGGING,
    ACTIVATION_LOCK_TIMEOUT_MS:
      env.ACTIVATION_LOCK_TIMEOUT_MS !== undefined
        ? parseNonNegativeInteger(
            "ACTIVATION_LOCK_TIMEOUT_MS",
            env.ACTIVATION_LOCK_TIMEOUT_MS,
          )
        : stageConfig.ACTIVATION_LOCK_TIMEOUT_MS,
  }
}
