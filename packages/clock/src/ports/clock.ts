import type { Milliseconds } from "./time"

/** Source of wall-clock time. Inject it instead of calling `Date.now()`. */
export interface Clock {
  now(): Date
  nowMs(): Milliseconds
}
