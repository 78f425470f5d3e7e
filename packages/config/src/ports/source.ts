/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation and coercion happen once, on the merged
 * record, against the caller's schema. Later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Reported by `Config.explain()`, e.g. "env" or "object:overrides".
   */
  readonly name: string

  /**
   * An `undefined` value means "not provided" and does not override.
   */
  load(): Promise<Record<string, unknown>>
}
