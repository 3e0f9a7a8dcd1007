import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName
  /** Human-readable output through pino-pretty. Leave off where JSON lines are collected. */
  prettify?: boolean
}
