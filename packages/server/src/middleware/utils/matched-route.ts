import type { Context } from "hono"
import { matchedRoutes } from "hono/route"

/**
 * Path pattern of the handler that served the request, e.g.
 * `/api/v1/presets/:name`. Falls back to the concrete path when only
 * middleware matched.
 */
export function matchedRoute(c: Context): string {
  const routes = matchedRoutes(c)

  for (let i = routes.length - 1; i >= 0; i--) {
    const route = routes[i]
    if (route && route.method !== "ALL") return route.path
  }

  return c.req.path
}
