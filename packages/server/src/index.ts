export {
  DEFAULT_FALLBACK,
  type ErrorMapping,
  type ErrorMappingsConfig,
  type ErrorResponse,
  type ErrorResponseBody,
  type FallbackMapping,
} from "./errors/error-formatter"
export {
  formatIssuePath,
  isValidationError,
  parseOrThrow,
  ValidationError,
  type ValidationIssue,
} from "./errors/validation-error"
export type { StatusCode } from "./http/status-codes"
export type { ServerHandle } from "./lifecycle/create-stopper"
export type { LifecycleHook, LifecycleHookContext } from "./lifecycle/lifecycle-hook"
export type { StopResult } from "./lifecycle/shutdown"
export { StartupError } from "./lifecycle/startup-error"
export {
  type Application,
  type Context,
  createApp,
  createRouter,
  type Middleware,
  type RequestHandler,
  type Router,
} from "./server/app"
export { createServer, Server, type ServerState } from "./server/server"
export type { ServerDependencies, ServerOptions } from "./server/server-options"
export type { ServerContextVariables } from "./types/context"
export { applyOverrides, type DeepPartial } from "./utils/apply-overrides"
