import { OrderedEvictionPolicy } from "./ordered-eviction-policy"

/**
 * Victim is chosen before the incoming key is admitted, so with capacity 1
 * every new key replaces the sole entry.
 */
export class MruPolicy<K> extends OrderedEvictionPolicy<K> {
  constructor() {
    super({ name: "mru", refreshOnAccess: true, evictFrom: "newest" })
  }
}
