import type { TimeSource, UnixMs } from "@tunesmith/clock"
import type { Logger } from "@tunesmith/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export interface Closeable {
  close: (callback?: (err?: Error | null) => void) => unknown
}

export type ShutdownContext = {
  server: Closeable
  clock: TimeSource
  logger: Logger
  deadlineMs: UnixMs
  stopHooks: LifecycleHook[]
}

export type StopResult = {
  ok: boolean
  failures: HookFailure[]
  /** Open sockets are left as they are when this is set. */
  timedOut: boolean
}

/**
 * Stops accepting connections, then runs the stop hooks (dropping cached
 * generation clients and preset summaries). A failing hook does not stop the
 * ones after it.
 */
export async function shutdown(ctx: ShutdownContext): Promise<StopResult> {
  ctx.logger.warn("Shutting down gracefully...")

  const { failures, timedOut } = await runHooks(
    { phase: "shutdown", clock: ctx.clock, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    [closeListenerHook(ctx.server), ...ctx.stopHooks],
    { failFast: false },
  )

  const ok = failures.length === 0 && !timedOut

  ctx.logger.info("Shutdown complete", { ok, failed: failures.map((f) => f.hook), timedOut })

  return { ok, failures, timedOut }
}

export type ShutdownFn = typeof shutdown

function closeListenerHook(server: Closeable): LifecycleHook {
  return { name: "server.close", fn: ({ signal }) => closeListener(server, signal) }
}

/**
 * Resolves once `server.close()` reports back, or as soon as `signal` aborts.
 * Rejects with the close error unless the signal won.
 */
function closeListener(server: Closeable, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve()

  return new Promise((resolve, reject) => {
    const onAbort = () => resolve()

    signal.addEventListener("abort", onAbort, { once: true })

    server.close((err) => {
      signal.removeEventListener("abort", onAbort)

      if (err && !signal.aborted) reject(err)
      else resolve()
    })
  })
}
