/**
 * Bookkeeping strategy that decides which key leaves a full cache.
 *
 * A policy only tracks keys; values stay in the cache. The cache calls the
 * hooks in lockstep with its store, so the set of tracked keys always equals
 * the set of stored keys. Each policy instance belongs to exactly one cache.
 */
export interface EvictionPolicy<K> {
  /**
   * Shown in logs and stats. Built-ins use their {@link EvictionPolicyName}.
   */
  readonly name: string

  /**
   * A key was admitted. Called for keys the policy does not track yet.
   */
  onInsert(key: K): void

  /**
   * A tracked key was read with `get`, or overwritten with `put`.
   */
  onAccess(key: K): void

  /**
   * A tracked key left the cache, by eviction or explicit delete.
   * Untracked keys are ignored.
   */
  onEvict(key: K): void

  /**
   * The key to evict next, or `undefined` when nothing is tracked.
   * Must not change any state.
   */
  victim(): K | undefined

  size(): number

  clear(): void
}
