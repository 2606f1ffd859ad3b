import type { TimeSource } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/** Manually driven clock for tests. */
export class FakeClock implements TimeSource {
  private time: UnixMs

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: UnixMs): void {
    this.time = ms
  }
}
