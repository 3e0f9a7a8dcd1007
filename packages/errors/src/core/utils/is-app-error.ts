import type { AppError } from "../../ports/error"

const isObject = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null

/**
 * Recognises app errors by shape, so an error built by a second copy of this
 * package (a nested node_modules) still keeps its code when serialized.
 */
export function isAppError(e: unknown): e is AppError {
  return (
    e instanceof Error &&
    isObject(e) &&
    typeof e.code === "string" &&
    isObject(e.context) &&
    typeof e.isRetryable === "boolean" &&
    typeof e.isOperational === "boolean" &&
    e.timestamp instanceof Date &&
    !Number.isNaN(e.timestamp.getTime())
  )
}
