/**
 * Validated configuration plus where each value came from.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ CACHE_CAPACITY: z.coerce.number().int().positive() }),
 *   sources: [new EnvSource({ prefix: "APP_" })],
 * })
 *
 * config.value.CACHE_CAPACITY    // 500
 * config.explain("CACHE_CAPACITY") // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /**
   * Name of the source that provided the final value for `key`, or
   * `"default"` when the schema supplied it.
   */
  explain<K extends keyof T & string>(key: K): string

  /**
   * Distinct provenance values in first-use order. Includes `"default"`
   * when a schema default supplied some key.
   */
  sourcesUsed(): string[]

  /**
   * Keys provided by some source that the schema does not know.
   * Usually a typo or a stale setting.
   */
  unknownKeys(): string[]
}
