export type LogContext = {
  service: string
  module: string
  env: string

  /** Name of the cache instance emitting the entry. */
  cache: string
  /** Eviction policy of that cache. */
  policy: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields merged into a logger's bindings by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
