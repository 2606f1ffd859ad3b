export { BaseError, type BaseErrorOptions } from "./core/base-error"
export { type SerializeOptions, serializeError } from "./core/serialize-error"
export { describeErrorChain } from "./core/utils/describe-error-chain"
export { errorChain } from "./core/utils/error-chain"
export { hasErrorCode, isAppError } from "./core/utils/is-app-error"
export { isSystemError } from "./core/utils/is-system-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
