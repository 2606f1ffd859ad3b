import type { TimeSource } from "@tunesmith/clock"
import type { Logger } from "@tunesmith/logger"
import type { Middleware } from "../server/app"
import type { ResolvedServerOptions } from "../server/server-options"
import { requestIdMiddleware } from "./request-id"
import { requestLoggerMiddleware } from "./request-logger"
import { requestLoggingMiddleware } from "./request-logging"

export function createDefaultMiddleware(
  options: ResolvedServerOptions,
  logger: Logger,
  clock: TimeSource,
): Middleware[] {
  const middleware: Middleware[] = []

  if (options.requestId.enabled) {
    middleware.push(requestIdMiddleware(options.requestId))
  }

  middleware.push(requestLoggerMiddleware(logger))

  if (options.requestLogging.enabled) {
    middleware.push(requestLoggingMiddleware(options.requestLogging, logger, clock))
  }

  return middleware
}

export type CreateDefaultMiddlewareFn = typeof createDefaultMiddleware
