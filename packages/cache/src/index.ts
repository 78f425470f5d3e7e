export {
  type EvictionCacheConfig,
  type EvictionCacheFromConfigDeps,
  createEvictionCacheFromConfig,
  evictionCacheConfigSchema,
  type LoadEvictionCacheConfigOptions,
  loadEvictionCacheConfig,
} from "./core/config/eviction-cache-config"
export { EvictionInvariantError, InvalidConfigurationError } from "./core/errors"
export {
  type CreateEvictionCacheOptions,
  createEvictionCache,
  EvictionCache,
  type EvictionCacheDeps,
  type EvictionCacheOptions,
} from "./core/eviction-cache"
export { createEvictionPolicy } from "./core/eviction/create-eviction-policy"
export { FifoPolicy } from "./core/eviction/fifo-policy"
export { KeyList } from "./core/eviction/key-list"
export { LfuPolicy } from "./core/eviction/lfu-policy"
export { LifoPolicy } from "./core/eviction/lifo-policy"
export { LruPolicy } from "./core/eviction/lru-policy"
export { MruPolicy } from "./core/eviction/mru-policy"
export {
  OrderedEvictionPolicy,
  type OrderedEvictionPolicyOptions,
} from "./core/eviction/ordered-eviction-policy"
export {
  EVICTION_POLICY_NAMES,
  type EvictionPolicyName,
  isEvictionPolicyName,
} from "./ports/cache-eviction-policy"
export {
  CACHE_MISS,
  type CacheHit,
  type CacheMiss,
  type CacheResult,
  isHit,
} from "./ports/cache-result"
export type { CacheStats } from "./ports/cache-stats"
export type { EvictionListener, EvictionReason } from "./ports/eviction-listener"
export type { EvictionPolicy } from "./ports/eviction-policy"
export type { KeyValueCache } from "./ports/key-value-cache"
