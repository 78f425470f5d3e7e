export type CacheStats = {
  hits: number
  misses: number
  /** Entries removed to make room. Explicit deletes are not counted. */
  evictions: number
  size: number
  capacity: number
  /** `hits / (hits + misses)`, 0 before the first lookup. */
  hitRate: number
}
