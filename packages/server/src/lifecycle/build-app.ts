import type { ErrorHandler } from "../errors/create-error-handler"
import { registerHealthRoutes } from "../routes/health"
import type { Application, Middleware } from "../server/app"
import type { ResolvedServerOptions } from "../server/server-options"

export interface BuildAppContext {
  app: Application
  options: ResolvedServerOptions
  isReady: () => boolean
  errorHandler: ErrorHandler
  defaultMiddleware: Middleware[]
}

/**
 * Wire an application in a fixed order: default middleware, health routes,
 * API routes, then the not-found and error handlers.
 */
export function buildApp(ctx: BuildAppContext): Application {
  const { app, options } = ctx

  applyMiddleware(app, ctx.defaultMiddleware)

  registerHealthRoutes(app, options.health, ctx.isReady)

  options.routes(app)

  app.notFound((c) =>
    c.json(
      {
        error: {
          status: 404,
          code: "route_not_found",
          message: `No route for ${c.req.method} ${c.req.path}`,
          requestId: c.get("requestId") ?? "unknown",
        },
      },
      404,
    ),
  )
  app.onError(ctx.errorHandler)

  return app
}

export type BuildAppFn = typeof buildApp

function applyMiddleware(app: Application, middleware: Middleware[]): void {
  for (const mw of middleware) app.use("*", mw)
}
