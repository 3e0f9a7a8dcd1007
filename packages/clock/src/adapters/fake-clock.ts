import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/**
 * Clock that stands still until a test moves it. `advance()` only goes
 * forward; use `set()` to jump anywhere.
 */
export class FakeClock implements Clock {
  private current: Milliseconds

  constructor(start: Milliseconds | Date = 0) {
    this.current = typeof start === "number" ? start : start.getTime()
  }

  nowMs(): Milliseconds {
    return this.current
  }

  now(): Date {
    return new Date(this.current)
  }

  advance(ms: Milliseconds): void {
    if (ms < 0) throw new RangeError(`FakeClock cannot move backwards (${ms}ms)`)

    this.current += ms
  }

  set(at: Milliseconds | Date): void {
    this.current = typeof at === "number" ? at : at.getTime()
  }
}
