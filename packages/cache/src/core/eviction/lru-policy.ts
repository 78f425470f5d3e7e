import { OrderedEvictionPolicy } from "./ordered-eviction-policy"

export class LruPolicy<K> extends OrderedEvictionPolicy<K> {
  constructor() {
    super({ name: "lru", refreshOnAccess: true, evictFrom: "oldest" })
  }
}
