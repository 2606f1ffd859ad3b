import { BaseError } from "@tunesmith/errors"
import { formatIssuePath, type ValidationIssue } from "@tunesmith/server"
import type { $ZodIssue } from "zod/v4/core"

export type PresetErrorCode = "preset_not_found" | "invalid_preset"

export class PresetError extends BaseError<PresetErrorCode> {
  static notFound(name: string): PresetError {
    return new PresetError(`Preset "${name}" not found`, {
      code: "preset_not_found",
      context: { name },
      isRetryable: false,
    })
  }

  static invalid(name: string, issues: ValidationIssue[], cause?: unknown): PresetError {
    const details = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message))

    return new PresetError(`Invalid preset "${name}": ${details.join("; ")}`, {
      code: "invalid_preset",
      context: { name, issues },
      ...(cause !== undefined && { cause }),
      isRetryable: false,
    })
  }

  static fromIssues(name: string, issues: readonly $ZodIssue[]): PresetError {
    return PresetError.invalid(
      name,
      issues.map((i) => ({ path: formatIssuePath(i.path), message: i.message })),
    )
  }
}
