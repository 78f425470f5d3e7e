import { OrderedEvictionPolicy } from "./ordered-eviction-policy"

export class FifoPolicy<K> extends OrderedEvictionPolicy<K> {
  constructor() {
    super({ name: "fifo", refreshOnAccess: false, evictFrom: "oldest" })
  }
}
