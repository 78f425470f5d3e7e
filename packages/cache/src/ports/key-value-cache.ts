import type { CacheResult } from "./cache-result"
import type { CacheStats } from "./cache-stats"

/**
 * Bounded, synchronous, in-process key-value cache.
 *
 * @remarks
 * - Holds at most `capacity()` entries. Admitting a new key into a full cache
 *   evicts exactly one other entry in the same call.
 * - Not internally synchronized. Callers sharing one instance across
 *   concurrent tasks must serialize access.
 */
export interface KeyValueCache<K, V> {
  /**
   * Insert or overwrite. Overwriting never evicts and never changes `size()`.
   */
  put(key: K, value: V): void

  /**
   * Look up a value. A hit counts as an access for the eviction policy.
   */
  get(key: K): CacheResult<V>

  /**
   * Look up a value without touching eviction bookkeeping.
   */
  peek(key: K): CacheResult<V>

  /**
   * Pure membership test, no bookkeeping.
   */
  contains(key: K): boolean

  /**
   * Return the cached value, or compute, store and return it.
   * Errors thrown by `factory` propagate and leave the cache, stats
   * included, unchanged. A miss is counted once `factory` returns.
   */
  getOrSet(key: K, factory: (key: K) => V): V

  /**
   * Returns true if the key was present.
   */
  delete(key: K): boolean

  clear(): void

  keys(): K[]

  size(): number

  capacity(): number

  stats(): CacheStats
}
