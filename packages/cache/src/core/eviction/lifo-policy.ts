import { OrderedEvictionPolicy } from "./ordered-eviction-policy"

export class LifoPolicy<K> extends OrderedEvictionPolicy<K> {
  constructor() {
    super({ name: "lifo", refreshOnAccess: false, evictFrom: "newest" })
  }
}
