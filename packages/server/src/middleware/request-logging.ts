import { startStopwatch, type TimeSource } from "@tunesmith/clock"
import type { Logger } from "@tunesmith/logger"
import type { Middleware } from "../server/app"
import type { EnabledRequestLoggingConfig, PathString } from "../server/server-options"
import { matchedRoute } from "./utils/matched-route"

/**
 * Logs one line per completed request: 5xx at `error`, everything else at
 * the configured level.
 */
export function requestLoggingMiddleware(
  config: Required<EnabledRequestLoggingConfig>,
  baseLogger: Logger,
  clock: TimeSource,
): Middleware {
  return async (c, next) => {
    const path = c.req.path

    if (shouldIgnore(path, config.ignorePaths)) {
      await next()
      return
    }

    const stopwatch = startStopwatch(clock)

    try {
      await next()
    } finally {
      const status = c.res.status
      const method = c.req.method
      const route = matchedRoute(c)
      const userAgent = c.req.header("user-agent")

      const meta = {
        requestId: c.get("requestId") ?? "unknown",
        method,
        path,
        route,
        op: `${method} ${route}`,
        status,
        durationMs: Math.round(stopwatch.elapsedMs()),
        ...(userAgent !== undefined && { userAgent }),
      }

      const logger = c.get("logger") ?? baseLogger

      if (status >= 500) {
        logger.error("Request completed", meta)
      } else {
        logger[config.level]("Request completed", meta)
      }
    }
  }
}

function shouldIgnore(path: string, ignorePaths: PathString[]): boolean {
  return ignorePaths.some((ignored) => path === ignored || path.startsWith(`${ignored}/`))
}
