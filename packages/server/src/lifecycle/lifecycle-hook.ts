import type { Milliseconds } from "@tunesmith/clock"

export interface LifecycleHookContext {
  /** Aborted when the phase deadline passes. */
  signal: AbortSignal
  timeRemainingMs: Milliseconds
}

export interface LifecycleHook {
  name: string
  fn: (ctx: LifecycleHookContext) => Promise<void>
}

export interface HookFailure {
  hook: string
  error: unknown
}
