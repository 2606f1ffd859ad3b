import { BaseError, type ErrorContext } from "@tunesmith/errors"

export type GenerationErrorCode = "empty_prompt" | "invalid_client_config" | "generation_failed"

export class GenerationError extends BaseError<GenerationErrorCode> {
  static emptyPrompt(): GenerationError {
    return new GenerationError("Prompt is empty: provide text, a genre or a preset", {
      code: "empty_prompt",
      isRetryable: false,
    })
  }

  static invalidClientConfig(
    message: string,
    context?: ErrorContext,
    cause?: unknown,
  ): GenerationError {
    return new GenerationError(message, {
      code: "invalid_client_config",
      ...(context && { context }),
      ...(cause !== undefined && { cause }),
      isRetryable: false,
    })
  }

  static failed(message: string, context?: ErrorContext, cause?: unknown): GenerationError {
    return new GenerationError(message, {
      code: "generation_failed",
      ...(context && { context }),
      ...(cause !== undefined && { cause }),
      isRetryable: true,
    })
  }
}
