import type { EvictionPolicy } from "../../ports/eviction-policy"
import { KeyList } from "./key-list"

export type OrderedEvictionPolicyOptions = {
  name: string

  /**
   * Move a key to the newest position when it is accessed.
   * Off for insertion-ordered policies.
   */
  refreshOnAccess: boolean

  /**
   * End of the order the victim is taken from: `oldest` or `newest`.
   */
  evictFrom: "oldest" | "newest"
}

/**
 * Policies whose whole state is one ordering of keys: FIFO, LIFO, LRU and MRU.
 */
export class OrderedEvictionPolicy<K> implements EvictionPolicy<K> {
  readonly name: string
  private readonly order = new KeyList<K>()

  constructor(private readonly opts: OrderedEvictionPolicyOptions) {
    this.name = opts.name
  }

  onInsert(key: K): void {
    if (this.order.has(key)) {
      this.onAccess(key)

      return
    }

    this.order.push(key)
  }

  onAccess(key: K): void {
    if (!this.opts.refreshOnAccess) return

    this.order.moveToTail(key)
  }

  onEvict(key: K): void {
    this.order.remove(key)
  }

  victim(): K | undefined {
    return this.opts.evictFrom === "oldest" ? this.order.first() : this.order.last()
  }

  size(): number {
    return this.order.size()
  }

  clear(): void {
    this.order.clear()
  }

  /**
   * Tracked keys from oldest to newest position.
   */
  ordered(): K[] {
    return [...this.order]
  }
}
