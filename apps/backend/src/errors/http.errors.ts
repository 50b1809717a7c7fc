import { HTTPException } from "hono/http-exception"
import type { ContentfulStatusCode } from "hono/utils/http-status"

// Error codes catalog
export const ErrorCode = {
  // Request errors (4xx)
  INVALID_REQUEST: "INVALID_REQUEST",
  MISSING_FIELD: "MISSING_FIELD",
  INVALID_FORMAT: "INVALID_FORMAT",

  // Auth errors (4xx)
  UNAUTHORIZED: "UNAUTHORIZED",
  INVALID_API_KEY: "INVALID_API_KEY",
  FORBIDDEN: "FORBIDDEN",
  INVALID_SIGNATURE: "INVALID_SIGNATURE",

  // Access/subscription errors (4xx)
  NOT_FOUND: "NOT_FOUND",
  CONFLICT: "CONFLICT",
  INVALID_TRANSITION: "INVALID_TRANSITION",
  TRIAL_UNAVAILABLE: "TRIAL_UNAVAILABLE",

  // System errors (5xx)
  AUDIT_WRITE_FAULT: "AUDIT_WRITE_FAULT",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode]

// Additional error details that can be attached to HTTPError
export interface ErrorDetails {
  userId?: string
  packageId?: string
  subscriptionId?: string
  retryable?: boolean
}

// HTTPError class that extends HTTPException with consistent JSON format
export class HTTPError extends HTTPException {
  public readonly code: ErrorCode
  public readonly details?: ErrorDetails

  constructor(
    status: ContentfulStatusCode,
    code: ErrorCode,
    message: string,
    details?: ErrorDetails,
  ) {
    // Create consistent JSON response body
    const res = new Response(
      JSON.stringify({
        error: message,
        code,
        ...(details != null && { details }),
      }),
      {
        status,
        headers: { "Content-Type": "application/json" },
      },
    )

    // - message: for proper error.message property
    // - res: for custom JSON response body
    super(status, { res, message })
    this.code = code
    this.details = details
  }
}
