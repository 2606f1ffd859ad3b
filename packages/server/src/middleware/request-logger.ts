import type { Logger } from "@tunesmith/logger"
import type { Middleware } from "../server/app"
import { isNonEmptyString } from "./utils/is-non-empty-string"

/** Binds a child logger carrying the request id to the context. */
export function requestLoggerMiddleware(baseLogger: Logger): Middleware {
  return async (c, next) => {
    if (!c.get("logger")) {
      const requestId = c.get("requestId")

      c.set("logger", isNonEmptyString(requestId) ? baseLogger.child({ requestId }) : baseLogger)
    }

    await next()
  }
}
