/**
 * Why an entry left the cache. `clear()` does not notify.
 */
export type EvictionReason = "capacity" | "delete"

export type EvictionListener<K, V> = (key: K, value: V, reason: EvictionReason) => void
