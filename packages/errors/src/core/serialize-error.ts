import type { SerializedError } from "../ports/error"
import { isAppError } from "./utils/is-app-error"

export type SerializeOptions = Readonly<{
  /** Default: false */
  includeStack?: boolean
}>

/**
 * Converts any thrown value to a {@link SerializedError}. App errors keep their
 * code, context and flags. Plain errors become non-operational with their
 * errno-style code (`ENOENT`, `EAUTH`) or `unknown`. Anything else is wrapped
 * with the raw value in `context.value`.
 */
export function serializeError(err: unknown, options: SerializeOptions = {}): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: { value: err },
      isRetryable: false,
      isOperational: false,
      timestamp: new Date().toISOString(),
    }
  }

  const tail = {
    ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
    ...(options.includeStack && err.stack && { stack: err.stack }),
  }

  if (isAppError(err)) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isRetryable: err.isRetryable,
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...tail,
    }
  }

  return {
    name: err.name,
    code: errnoCode(err) ?? "unknown",
    message: err.message,
    context: {},
    isRetryable: false,
    isOperational: false,
    timestamp: new Date().toISOString(),
    ...tail,
  }
}

function errnoCode(err: Error): string | undefined {
  const code: unknown = Reflect.get(err, "code")

  return typeof code === "string" ? code : undefined
}
