import type { Logger } from "@tunesmith/logger"
import type { StopResult } from "./shutdown"

/** The part of `process` the handlers attach to. */
export interface ProcessEvents {
  on(event: string, listener: (...args: unknown[]) => void): unknown
  off(event: string, listener: (...args: unknown[]) => void): unknown
}

export interface SignalHandlerContext {
  logger: Logger
  stop?: () => Promise<StopResult>
  /** @default 10_000 */
  fatalTimeoutMs?: number
  /** @default process.exit */
  exit?: (code: number) => void
  /** @default process */
  events?: ProcessEvents
}

export interface SignalHandler {
  unregister: () => void
}

type ResolvedContext = SignalHandlerContext & {
  fatalTimeoutMs: number
  exit: (code: number) => void
}

type State = { stopping: boolean }

function handleSignal(ctx: ResolvedContext, state: State, signal: NodeJS.Signals): void {
  ctx.logger.info("Received signal", { signal })

  if (state.stopping) return
  state.stopping = true

  void gracefulShutdown(ctx, signal)
}

function handleFatal(ctx: ResolvedContext, state: State, reason: string, err: unknown): void {
  if (state.stopping) {
    ctx.logger.fatal("Fatal error during shutdown", { reason, err })
    ctx.exit(1)
    return
  }

  state.stopping = true

  void fatalShutdown(ctx, reason, err)
}

async function gracefulShutdown(ctx: ResolvedContext, reason: string): Promise<void> {
  ctx.logger.warn("Shutdown triggered", { reason })

  await runStop(ctx, reason)
}

async function fatalShutdown(ctx: ResolvedContext, reason: string, err: unknown): Promise<void> {
  ctx.logger.fatal("Fatal error", { reason, err })

  const timer = setTimeout(() => {
    ctx.logger.fatal("Forced exit after timeout", { timeoutMs: ctx.fatalTimeoutMs })
    ctx.exit(1)
  }, ctx.fatalTimeoutMs)

  timer.unref()

  try {
    await runStop(ctx, reason)
  } finally {
    clearTimeout(timer)
  }

  ctx.exit(1)
}

/** Never rejects: failures are logged. */
async function runStop(ctx: ResolvedContext, reason: string): Promise<void> {
  if (!ctx.stop) {
    ctx.logger.warn("No stop handler registered", { reason })
    return
  }

  try {
    const result = await ctx.stop()

    if (!result.ok) {
      ctx.logger.error("Shutdown completed with issues", {
        reason,
        failureCount: result.failures.length,
        timedOut: result.timedOut,
      })
    }
  } catch (err) {
    ctx.logger.error("Shutdown failed", { reason, err })
  }
}

/**
 * Stop gracefully on SIGINT/SIGTERM; stop and exit 1 on an uncaught
 * exception or unhandled rejection.
 */
export function setupProcessHandlers(context: SignalHandlerContext): SignalHandler {
  const ctx: ResolvedContext = {
    ...context,
    fatalTimeoutMs: context.fatalTimeoutMs ?? 10_000,
    exit: context.exit ?? ((code) => process.exit(code)),
  }

  const state: State = { stopping: false }

  const events = context.events ?? process

  const handlers: Record<string, (arg: unknown) => void> = {
    SIGINT: () => handleSignal(ctx, state, "SIGINT"),
    SIGTERM: () => handleSignal(ctx, state, "SIGTERM"),
    uncaughtException: (err) => handleFatal(ctx, state, "uncaughtException", err),
    unhandledRejection: (reason) => handleFatal(ctx, state, "unhandledRejection", reason),
  }

  for (const [event, handler] of Object.entries(handlers)) events.on(event, handler)

  return {
    unregister: () => {
      for (const [event, handler] of Object.entries(handlers)) events.off(event, handler)
    },
  }
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers
