import { BaseError } from "@tunesmith/errors"

export type ConfigIssue = { key: string; message: string }

export class ConfigError extends BaseError<"invalid_config"> {
  readonly issues: readonly ConfigIssue[]

  constructor(issues: readonly ConfigIssue[], details: string) {
    super(`Configuration validation failed:\n${details}`, {
      code: "invalid_config",
      context: { issues },
      isOperational: false,
    })

    this.issues = issues
  }
}
