import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"
import { serializeError } from "./serialize-error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

/**
 * Root of every application error.
 *
 * Domain errors subclass it with a narrowed code union and static factories:
 *
 * @example
 * ```ts
 * class PresetError extends BaseError<"preset_not_found"> {
 *   static notFound(name: string) {
 *     return new PresetError(`Preset "${name}" not found`, {
 *       code: "preset_not_found",
 *       context: { name },
 *     })
 *   }
 * }
 * ```
 */
export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })

    this.name = new.target.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    Error.captureStackTrace(this, new.target)
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}
