import type { ConfigSource } from "../../ports/source"

/** In-memory values, typically programmatic overrides applied last. */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly obj: Record<string, unknown>,
    name = "object:overrides",
  ) {
    this.name = name
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.obj }
  }
}
