import type { Context } from "hono"
import type { Middleware } from "../server/app"
import type { EnabledRequestIdConfig } from "../server/server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"
import { setHeaderIfMissing } from "./utils/set-header-if-missing"

const MAX_REQUEST_ID_LENGTH = 128

function resolveRequestId(c: Context, config: Required<EnabledRequestIdConfig>): string {
  const existing = c.get("requestId")

  if (isNonEmptyString(existing)) return existing

  const fromHeader = c.req.header(config.header)?.trim()

  if (isNonEmptyString(fromHeader) && fromHeader.length <= MAX_REQUEST_ID_LENGTH) {
    return fromHeader
  }

  return config.generate()
}

/**
 * Takes the request id from the configured header, or generates one, stores
 * it on the context and echoes it on the response.
 */
export function requestIdMiddleware(config: Required<EnabledRequestIdConfig>): Middleware {
  return async (c, next) => {
    const requestId = resolveRequestId(c, config)

    c.set("requestId", requestId)

    await next()

    setHeaderIfMissing(c.res.headers, config.header.toLowerCase(), requestId)
  }
}
