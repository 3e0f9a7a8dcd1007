export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export { type Stopwatch, startStopwatch } from "./core/stopwatch"
export type { Clock } from "./ports/clock"
export type { Milliseconds } from "./ports/time"
