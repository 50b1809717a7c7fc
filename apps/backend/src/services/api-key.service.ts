import { createHash, randomBytes } from "node:crypto"
import type { ApiKeyRole } from "@/constants/subscription.constants"
import { ErrorCode, HTTPError } from "@/errors/http.errors"
import { logger } from "@/lib/logger"
import {
  type ApiKey,
  ApiKeyRepository,
  type ApiKeyRepositoryDeps,
} from "@/repositories/api-key.repository"
import type { AppEnv } from "@/types/app.env"

export interface ApiKeyServiceDeps
  extends ApiKeyRepositoryDeps,
    Pick<AppEnv, "STAGE"> {}

export interface CreateApiKeyParams {
  label: string
  role: ApiKeyRole
}

export interface ApiKeyResult {
  apiKey: string
  keyHash: string
}

function sha256Hex(value: string): string {
  return createHash("sha256").update(value).digest("hex")
}

export class ApiKeyService {
  private apiKeyRepository: ApiKeyRepository
  private stage: string

  constructor(deps: ApiKeyServiceDeps) {
    this.apiKeyRepository = new ApiKeyRepository(deps)
    this.stage = deps.STAGE
  }

  /**
   * Generates a new API key with stage-based prefix
   * Returns both the full key and the hash of the secret part
   */
  private generateApiKey(): ApiKeyResult {
    const prefix = `jp_${this.stage}_`
    const secretPart = randomBytes(16).toString("hex")

    return { apiKey: `${prefix}${secretPart}`, keyHash: sha256Hex(secretPart) }
  }

  /**
   * Hashes an API key for authentication
   * Strips the prefix and hashes only the secret part
   */
  private hashApiKey(apiKey: string): string {
    const prefixMatch = apiKey.match(/^jp_.+_([^_]+)$/)
    const secretPart = prefixMatch ? prefixMatch[1] : apiKey
    return sha256Hex(secretPart)
  }

  /**
   * Creates a key and stores only its hash. The key itself is returned once.
   */
  async createApiKey(params: CreateApiKeyParams): Promise<ApiKeyResult> {
    const log = logger.with({ label: params.label, role: params.role })

    const result = this.generateApiKey()
    await this.apiKeyRepository.createApiKey({
      keyHash: result.keyHash,
      label: params.label,
      role: params.role,
    })

    log.info("API key created")
    return result
  }

  /**
   * Authenticates a request by validating the API key
   * Throws HTTPError if invalid
   */
  async authenticateApiKey(apiKey: string): Promise<ApiKey> {
    const key = await this.apiKeyRepository.getApiKeyByHash(
      this.hashApiKey(apiKey),
    )

    if (!key) {
      throw new HTTPError(401, ErrorCode.INVALID_API_KEY, "Invalid API key")
    }

    return key
  }
}
