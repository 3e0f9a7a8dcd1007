/** Lower snake case, e.g. `transport_timeout`. */
export type ErrorCode = Lowercase<string>

/** Values that explain a failure (URIs, hosts, SMTP stages) without parsing the message. */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /**
   * A later attempt with the same input could succeed: timeouts, refused
   * connections, 4xx SMTP replies. Tasks never retry themselves; whoever
   * scheduled the run reads this flag.
   */
  readonly isRetryable: boolean

  /**
   * `false` marks a bug rather than a bad input or an unreachable server.
   * Defaults to `true`.
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/** JSON-safe error shape written to logs and run reports. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
