import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

export type Stopwatch = {
  readonly startedAt: Milliseconds
  elapsedMs(): Milliseconds
}

/** Starts measuring from the clock's current time. */
export function startStopwatch(clock: Clock): Stopwatch {
  const startedAt = clock.nowMs()

  return {
    startedAt,
    elapsedMs: () => clock.nowMs() - startedAt,
  }
}
