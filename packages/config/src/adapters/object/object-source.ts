import type { ConfigSource } from "../../ports/source"

/**
 * In-memory values, typically last in the source list so they win.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly values: Readonly<Record<string, unknown>>,
    name = "object:overrides",
  ) {
    this.name = name
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
