import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

export class SystemClock implements Clock {
  nowMs(): Milliseconds {
    return Date.now()
  }

  now(): Date {
    return new Date(this.nowMs())
  }
}
