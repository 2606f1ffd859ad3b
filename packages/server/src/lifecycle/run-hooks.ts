import { type Milliseconds, startStopwatch, type TimeSource, type UnixMs } from "@tunesmith/clock"
import type { Logger } from "@tunesmith/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"

export type HookPhase = "startup" | "shutdown"

export type RunHooksContext = {
  phase: HookPhase
  clock: TimeSource
  logger: Logger
  deadlineMs: UnixMs
}

export type RunHooksPolicy = {
  /** Stop after the first failure. */
  failFast?: boolean
}

export type RunHooksResult = { failures: HookFailure[]; timedOut: boolean }

type HookOutcome =
  | { kind: "done"; durationMs: Milliseconds }
  | { kind: "failed"; failure: HookFailure; timedOut: boolean }
  | { kind: "timed_out" }

/**
 * Runs hooks one at a time against a shared deadline. Each hook's signal
 * aborts at the deadline; hooks left once it has passed are skipped.
 */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: LifecycleHook[],
  policy: RunHooksPolicy = {},
): Promise<RunHooksResult> {
  const failures: HookFailure[] = []
  const label = ctx.phase === "startup" ? "Startup" : "Shutdown"

  for (const hook of hooks) {
    const outcome = await runOneHook(ctx, hook)

    switch (outcome.kind) {
      case "done":
        ctx.logger.debug(`Executed ${ctx.phase} hook: ${hook.name}`, {
          durationMs: outcome.durationMs,
        })
        break

      case "timed_out":
        ctx.logger.warn(`${label} deadline exceeded during hook: ${hook.name}`)
        return { failures, timedOut: true }

      case "failed":
        ctx.logger.error(`${label} hook failed: ${hook.name}`, { err: outcome.failure.error })
        failures.push(outcome.failure)

        if (outcome.timedOut || policy.failFast) {
          return { failures, timedOut: outcome.timedOut }
        }
    }
  }

  return { failures, timedOut: false }
}

async function runOneHook(ctx: RunHooksContext, hook: LifecycleHook): Promise<HookOutcome> {
  const msLeft = Math.max(0, ctx.deadlineMs - ctx.clock.nowMs())

  if (msLeft <= 0) {
    ctx.logger.warn(`Skipping remaining ${ctx.phase} hooks due to timeout`)
    return { kind: "timed_out" }
  }

  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), msLeft)
  const watch = startStopwatch(ctx.clock)
  const pastDeadline = () => controller.signal.aborted || ctx.clock.nowMs() >= ctx.deadlineMs

  try {
    await hook.fn({ signal: controller.signal, timeRemainingMs: msLeft })

    return pastDeadline() ? { kind: "timed_out" } : { kind: "done", durationMs: watch.elapsedMs() }
  } catch (err) {
    return { kind: "failed", failure: { hook: hook.name, error: err }, timedOut: pastDeadline() }
  } finally {
    clearTimeout(timeoutId)
  }
}
