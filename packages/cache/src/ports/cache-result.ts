export type CacheHit<T> = {
  kind: "hit"
  value: T
}

/**
 * Returned for absent keys. A miss is an expected outcome, never an error.
 */
export type CacheMiss = {
  kind: "miss"
}

export type CacheResult<T> = CacheHit<T> | CacheMiss

export const CACHE_MISS: CacheMiss = Object.freeze({ kind: "miss" })

export function isHit<T>(result: CacheResult<T>): result is CacheHit<T> {
  return result.kind === "hit"
}
