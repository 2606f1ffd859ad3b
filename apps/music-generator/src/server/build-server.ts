import {
  type Application,
  createServer,
  type LifecycleHook,
  type Server,
} from "@tunesmith/server"
import type { AppContext } from "../app/create-context"
import { errorMappings } from "./error-mappings"

export type BuiltServer = {
  app: Application
  server: Server
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

export function buildServer(ctx: AppContext): BuiltServer {
  const startHooks = ctx.createStartHooks(ctx)
  const stopHooks = ctx.createStopHooks(ctx)

  const server = createServer(
    {
      clock: ctx.services.core.clock,
      logger: ctx.services.core.logger,
    },
    {
      host: ctx.config.server.host,
      port: ctx.config.server.port,
      shutdownTimeoutMs: ctx.config.server.shutdownTimeoutMs,

      errorMappings,

      requestId: {
        enabled: true,
        header: ctx.config.requestId.header,
      },

      requestLogging: ctx.config.requestLogging.enabled
        ? { enabled: true }
        : { enabled: false },

      routes: (app: Application): void => {
        ctx.registerRoutes(app, ctx.config, ctx.services.domains)
      },

      startHooks,
      stopHooks,
    },
  )

  return {
    app: server.build(),
    server,
    startHooks,
    stopHooks,
  }
}
