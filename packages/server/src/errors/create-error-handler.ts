import type { ErrorCode } from "@tunesmith/errors"
import type { Logger } from "@tunesmith/logger"
import type { ErrorHandler as HonoErrorHandler } from "hono"
import type { StatusCode } from "../http/status-codes"
import { matchedRoute } from "../middleware/utils/matched-route"
import { createErrorFormatter, type ErrorMappingsConfig } from "./error-formatter"

export type ErrorHandler = HonoErrorHandler

export function createErrorHandler(mappings: ErrorMappingsConfig, logger: Logger): ErrorHandler {
  const formatter = createErrorFormatter(mappings)

  return (err, c) => {
    const requestId = c.get("requestId") ?? "unknown"
    const response = formatter(err, requestId)

    const route = matchedRoute(c)

    logError(c.get("logger") ?? logger, err, {
      requestId,
      method: c.req.method,
      route,
      status: response.error.status,
      code: response.error.code,
    })

    return c.json(response, response.error.status)
  }
}

export type CreateErrorHandlerFn = typeof createErrorHandler

type ErrorLogMeta = {
  requestId: string
  method: string
  route: string
  status: StatusCode
  code: ErrorCode
}

/**
 * - 5xx: error, with `err`
 * - 4xx: info without `err`, debug with it
 */
function logError(logger: Logger, err: unknown, meta: ErrorLogMeta): void {
  const base = { ...meta, op: `${meta.method} ${meta.route}` }

  if (meta.status >= 500) {
    logger.error("Request failed", { ...base, err })
    return
  }

  logger.info("Request failed", base)
  logger.debug("Request failed details", { ...base, err })
}
