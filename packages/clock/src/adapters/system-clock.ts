import type { TimeSource } from "../ports/clock"
import type { UnixMs } from "../ports/time"

export class SystemClock implements TimeSource {
  now(): Date {
    return new Date()
  }

  nowMs(): UnixMs {
    return Date.now()
  }
}
