export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export { type Stopwatch, startStopwatch } from "./core/stopwatch"
export type { TimeSource } from "./ports/clock"
export type { Milliseconds, Seconds, UnixMs } from "./ports/time"
