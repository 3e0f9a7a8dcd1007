import { BaseError } from "@mailtask/errors"
import type { ZodType } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { ConfigSource } from "../ports/source"

export type ConfigIssue = {
  /** Dotted path of the offending setting. */
  key: string
  /** Name of the source that supplied the value, or `unset`. */
  source: string
  message: string
}

export class ConfigValidationError extends BaseError<"invalid_config"> {
  constructor(readonly issues: readonly ConfigIssue[]) {
    super(`Invalid configuration:\n${issues.map(formatIssue).join("\n")}`, {
      code: "invalid_config",
      context: { keys: issues.map((i) => i.key) },
      isOperational: false,
    })
  }
}

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  /** Later sources win. Defaults to the process environment. */
  sources?: ConfigSource[]
}

/**
 * Merges every source, then validates and coerces the result with `schema`.
 * The returned value is frozen.
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources = [new EnvSource()],
}: LoadConfigOptions<T>): Promise<Readonly<T>> {
  const merged: Record<string, unknown> = {}
  const origin = new Map<string, string>()

  for (const source of sources) {
    for (const [key, value] of Object.entries(await source.load())) {
      if (value === undefined) continue

      merged[key] = value
      origin.set(key, source.name)
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => {
        const root = issue.path[0]

        return {
          key: issue.path.length > 0 ? issue.path.map(String).join(".") : "(root)",
          source: (typeof root === "string" && origin.get(root)) || "unset",
          message: issue.message,
        }
      }),
    )
  }

  return Object.freeze(result.data)
}

function formatIssue({ key, source, message }: ConfigIssue): string {
  return `  ${key} (${source}): ${message}`
}
