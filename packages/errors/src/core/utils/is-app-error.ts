import type { AppError, ErrorCode } from "../../ports/error"

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Structural check, so errors from another copy of this package still match.
 */
export function isAppError(e: unknown): e is AppError {
  if (!(e instanceof Error)) return false
  if (!("code" in e && "context" in e)) return false
  if (!("isRetryable" in e && "isOperational" in e && "timestamp" in e)) return false

  return (
    typeof e.code === "string" &&
    typeof e.context === "object" &&
    e.context !== null &&
    typeof e.isRetryable === "boolean" &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp)
  )
}

export function hasErrorCode<C extends ErrorCode>(
  e: unknown,
  code: C,
): e is AppError & { readonly code: C } {
  return isAppError(e) && e.code === code
}
