/**
 * Well-known fields attached to log entries emitted while a task runs.
 *
 * Every field is optional at the call site (see {@link LogMeta}); the names are
 * fixed so log processors can index them.
 */
export type LogContext = {
  executionId: string
  taskId: string
  taskType: string

  service: string
  module: string
  env: string

  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
