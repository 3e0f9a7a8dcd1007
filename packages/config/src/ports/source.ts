/**
 * Supplies raw, unvalidated settings. Coercion and defaults belong to the
 * schema passed to `loadConfig`.
 */
export interface ConfigSource {
  /** Reported in validation errors, e.g. `env` or `object:overrides`. */
  readonly name: string

  /** Keys mapped to `undefined` count as absent. */
  load(): Promise<Record<string, unknown>>
}
