import { BaseError } from "@tunesmith/errors"
import type { StartResult } from "./startup"

export class StartupError extends BaseError<"startup_failed"> {
  static fromResult(result: StartResult): StartupError {
    const first = result.failures[0]

    const message = first
      ? `Startup hook "${first.hook}" failed`
      : "Startup hooks did not finish before the deadline"

    return new StartupError(message, {
      code: "startup_failed",
      context: {
        failedHooks: result.failures.map((f) => f.hook),
        timedOut: result.timedOut,
      },
      ...(first && { cause: first.error }),
      isOperational: false,
    })
  }
}
