import { BaseError, type ErrorContext } from "@tunesmith/errors"
import type { $ZodIssue, $ZodType } from "zod/v4/core"
import { z } from "zod/mini"

export type ValidationIssue = { path: string; message: string }

export type ValidationErrorContext = ErrorContext & {
  issues: ValidationIssue[]
}

export function formatIssuePath(path: readonly PropertyKey[]): string {
  let out = ""

  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }

  return out
}

export class ValidationError extends BaseError<"validation_error"> {
  readonly issues: readonly ValidationIssue[]

  constructor(issues: ValidationIssue[]) {
    super(issues[0]?.message ?? "Invalid input", {
      code: "validation_error",
      context: { issues },
    })

    this.issues = issues
  }

  static fromIssues(issues: readonly $ZodIssue[]): ValidationError {
    return new ValidationError(
      issues.map((i) => ({ path: formatIssuePath(i.path), message: i.message })),
    )
  }
}

/**
 * Validate `data` against a zod schema, throwing `ValidationError` with
 * every issue on failure.
 */
export function parseOrThrow<T>(schema: $ZodType<T>, data: unknown): T {
  const result = z.safeParse(schema, data)

  if (!result.success) {
    throw ValidationError.fromIssues(result.error.issues)
  }

  return result.data
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError
}
