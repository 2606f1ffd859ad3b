import { type AppError, type ErrorCode, isAppError } from "@tunesmith/errors"
import type { StatusCode } from "../http/status-codes"

export type ErrorMapping = {
  status: StatusCode

  /** User-facing message. Must not leak internals. */
  message: string
}

export type FallbackMapping = ErrorMapping & {
  code: ErrorCode
}

export type ErrorContextTransformer = (
  error: AppError,
) => Record<string, unknown> | undefined

export interface ErrorMappingsConfig {
  /**
   * Error code to status and message. Unmapped `AppError`s keep their code but
   * take the fallback status and message.
   */
  mappings: Partial<Record<ErrorCode, ErrorMapping>>

  /** Used for unmapped and non-application errors. */
  fallback?: FallbackMapping

  /**
   * Extra fields to expose from an error's context. Return `undefined` to
   * expose nothing.
   */
  transformContext?: ErrorContextTransformer
}

export type ErrorResponseBody = {
  status: StatusCode
  code: ErrorCode
  message: string
  requestId: string
  [key: string]: unknown
}

export type ErrorResponse = {
  error: ErrorResponseBody
}

export type ErrorFormatter = (error: unknown, requestId: string) => ErrorResponse

export const DEFAULT_FALLBACK: FallbackMapping = {
  code: "internal_error",
  status: 500,
  message: "An unexpected error occurred",
}

export function createErrorFormatter(config: ErrorMappingsConfig): ErrorFormatter {
  const fallback = config.fallback ?? DEFAULT_FALLBACK

  return (error, requestId) => {
    if (!isAppError(error)) {
      return {
        error: {
          code: fallback.code,
          status: fallback.status,
          message: fallback.message,
          requestId,
        },
      }
    }

    const mapping = config.mappings[error.code]
    const extra = mapping ? config.transformContext?.(error) : undefined

    return {
      error: {
        ...extra,
        code: error.code,
        status: mapping?.status ?? fallback.status,
        message: mapping?.message ?? fallback.message,
        requestId,
      },
    }
  }
}
