import { createNullLogger, type Logger } from "@evictkit/logger"
import type { EvictionPolicyName } from "../ports/cache-eviction-policy"
import { CACHE_MISS, type CacheResult } from "../ports/cache-result"
import type { CacheStats } from "../ports/cache-stats"
import type { EvictionListener, EvictionReason } from "../ports/eviction-listener"
import type { EvictionPolicy } from "../ports/eviction-policy"
import type { KeyValueCache } from "../ports/key-value-cache"
import { EvictionInvariantError, InvalidConfigurationError } from "./errors"
import { createEvictionPolicy } from "./eviction/create-eviction-policy"

export type EvictionCacheOptions<K, V> = {
  /**
   * Maximum number of entries. Positive integer, fixed for the cache's life.
   */
  capacity: number

  /**
   * Identifies the cache in logs. Default: "default".
   */
  name?: string

  /**
   * Called after an entry leaves the cache, once the cache is consistent
   * again. Errors it throws are logged and do not fail the cache call.
   */
  onEvict?: EvictionListener<K, V>
}

export type EvictionCacheDeps<K> = {
  policy: EvictionPolicy<K>
  logger?: Logger
}

type Slot<V> = {
  value: V
}

type Evicted<K, V> = {
  key: K
  value: V
}

export class EvictionCache<K, V> implements KeyValueCache<K, V> {
  private readonly store = new Map<K, Slot<V>>()
  private readonly policy: EvictionPolicy<K>
  private readonly logger: Logger
  private readonly maxEntries: number

  private hits = 0
  private misses = 0
  private evictions = 0

  public constructor(
    deps: EvictionCacheDeps<K>,
    private readonly opts: EvictionCacheOptions<K, V>,
  ) {
    if (!Number.isSafeInteger(opts.capacity) || opts.capacity <= 0) {
      throw new InvalidConfigurationError(
        `Cache capacity must be a positive integer, got ${String(opts.capacity)}`,
        { capacity: opts.capacity },
      )
    }

    if (deps.policy.size() > 0) {
      throw new InvalidConfigurationError(
        "Eviction policy already tracks keys; each cache needs its own policy instance",
        { policy: deps.policy.name, tracked: deps.policy.size() },
      )
    }

    this.maxEntries = opts.capacity
    this.policy = deps.policy
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "eviction-cache",
      cache: opts.name ?? "default",
      policy: deps.policy.name,
    })
  }

  put(key: K, value: V): void {
    const slot = this.store.get(key)

    if (slot) {
      slot.value = value
      this.policy.onAccess(key)

      return
    }

    const evicted = this.store.size >= this.maxEntries ? this.evictOne() : undefined

    this.store.set(key, { value })
    this.policy.onInsert(key)

    if (evicted) this.notify(evicted, "capacity")
  }

  get(key: K): CacheResult<V> {
    const slot = this.store.get(key)

    if (!slot) {
      this.misses++

      return CACHE_MISS
    }

    this.hits++
    this.policy.onAccess(key)

    return { kind: "hit", value: slot.value }
  }

  peek(key: K): CacheResult<V> {
    const slot = this.store.get(key)

    return slot ? { kind: "hit", value: slot.value } : CACHE_MISS
  }

  contains(key: K): boolean {
    return this.store.has(key)
  }

  getOrSet(key: K, factory: (key: K) => V): V {
    const slot = this.store.get(key)

    if (slot) {
      this.hits++
      this.policy.onAccess(key)

      return slot.value
    }

    const value = factory(key)

    this.misses++
    this.put(key, value)

    return value
  }

  delete(key: K): boolean {
    const slot = this.store.get(key)
    if (!slot) return false

    this.store.delete(key)
    this.policy.onEvict(key)

    this.notify({ key, value: slot.value }, "delete")

    return true
  }

  clear(): void {
    this.store.clear()
    this.policy.clear()
  }

  keys(): K[] {
    return [...this.store.keys()]
  }

  size(): number {
    return this.store.size
  }

  capacity(): number {
    return this.maxEntries
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses

    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.store.size,
      capacity: this.maxEntries,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    }
  }

  private evictOne(): Evicted<K, V> {
    const victim = this.policy.victim()
    const slot = victim === undefined ? undefined : this.store.get(victim)

    if (victim === undefined || !slot) {
      throw new EvictionInvariantError(
        `Policy "${this.policy.name}" named no stored victim while the cache was full`,
        { policy: this.policy.name, size: this.store.size, tracked: this.policy.size() },
      )
    }

    this.store.delete(victim)
    this.policy.onEvict(victim)
    this.evictions++

    this.logger.debug("Evicted entry", { key: victim, size: this.store.size })

    return { key: victim, value: slot.value }
  }

  private notify(evicted: Evicted<K, V>, reason: EvictionReason): void {
    const listener = this.opts.onEvict
    if (!listener) return

    try {
      listener(evicted.key, evicted.value, reason)
    } catch (err) {
      this.logger.error("Eviction listener threw", { err, key: evicted.key, reason })
    }
  }
}

export type CreateEvictionCacheOptions<K, V> = EvictionCacheOptions<K, V> & {
  policy: EvictionPolicyName | EvictionPolicy<K>
  logger?: Logger
}

/**
 * @example
 * ```ts
 * const users = createEvictionCache<string, User>({ capacity: 500, policy: "lru" })
 *
 * users.put("user:42", user)
 * const res = users.get("user:42") // { kind: "hit", value: user }
 * ```
 */
export function createEvictionCache<K, V>({
  policy,
  logger,
  ...opts
}: CreateEvictionCacheOptions<K, V>): EvictionCache<K, V> {
  const resolved = typeof policy === "string" ? createEvictionPolicy<K>(policy) : policy

  return new EvictionCache<K, V>({ policy: resolved, ...(logger && { logger }) }, opts)
}
