import type { TimeSource } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

export type Stopwatch = {
  readonly startedAt: UnixMs
  elapsedMs(): Milliseconds
}

/**
 * Starts measuring elapsed time against the given time source.
 *
 * @example
 * ```ts
 * const watch = startStopwatch(clock)
 * await generate()
 * logger.info("Generated", { durationMs: watch.elapsedMs() })
 * ```
 */
export function startStopwatch(time: TimeSource): Stopwatch {
  const startedAt = time.nowMs()

  return {
    startedAt,
    elapsedMs: () => Math.max(0, time.nowMs() - startedAt),
  }
}
