import type { ResolvedServerOptions, ServerDependencies } from "../server/server-options"
import type { LifecycleHook } from "./lifecycle-hook"
import type { Closeable, ShutdownFn, StopResult } from "./shutdown"

export interface ServerHandle {
  /** Idempotent; concurrent and repeated calls share one shutdown. */
  stop(): Promise<StopResult>
  address: { host: string; port: number }
}

export interface StopperContext {
  server: Closeable
  deps: ServerDependencies
  options: ResolvedServerOptions
  stopHooks: LifecycleHook[]
  setReady: (value: boolean) => void
  shutdown: ShutdownFn
  onStop: () => void
}

export function createStopper(ctx: StopperContext): ServerHandle {
  let stopping: Promise<StopResult> | undefined

  return {
    stop: () => {
      stopping ??= runShutdown(ctx)

      return stopping
    },
    address: {
      host: ctx.options.host,
      port: ctx.options.port,
    },
  }
}

export type CreateStopperFn = typeof createStopper

async function runShutdown(ctx: StopperContext): Promise<StopResult> {
  ctx.setReady(false)

  try {
    return await ctx.shutdown({
      server: ctx.server,
      clock: ctx.deps.clock,
      logger: ctx.deps.logger,
      deadlineMs: ctx.deps.clock.nowMs() + ctx.options.shutdownTimeoutMs,
      stopHooks: ctx.stopHooks,
    })
  } finally {
    ctx.onStop()
  }
}
